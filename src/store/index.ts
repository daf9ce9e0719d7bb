export * from './ledger.store';
export { MemoryLedgerStore } from './memory/memory.store';
export { MongoLedgerStore } from './mongo/mongo.store';
export { SimulatedFailureError } from './memory/failure.simulation';
