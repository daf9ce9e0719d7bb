import mongoose from 'mongoose';

import { LedgerSession, LedgerStore } from '../ledger.store';
import { MongoLedgerSession } from './mongo.session';

/**
 * LedgerStore on MongoDB. Units of work run as multi-document transactions
 * (replica set required); mongoose retries the callback on transient
 * write conflicts, so work functions must not call out of process.
 */
export class MongoLedgerStore implements LedgerStore {
  transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return mongoose.connection.transaction((session) => work(new MongoLedgerSession(session)));
  }

  execute<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return work(new MongoLedgerSession());
  }
}
