import axios, { AxiosInstance } from 'axios';

import { createServiceLogger } from '../observability/logger';
import { externalCallDuration } from '../observability/metrics';
import { isRecord, readNumber, readRecord, readString } from '../utils/parse';

import { ChainExplorer, ChainExplorerError, ChainTransaction, TokenTransfer } from './chain-explorer';

const log = createServiceLogger('tronscan');

export interface TronscanOptions {
  baseUrl: string;
  timeoutMs: number;
}

const toTransfer = (raw: unknown): TokenTransfer | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const contractAddress = readString(raw, 'contract_address');
  const toAddress = readString(raw, 'to_address');
  const quant = raw.quant;
  const amountRaw = typeof quant === 'number' ? String(quant) : typeof quant === 'string' ? quant : '';
  if (!contractAddress || !toAddress || !/^\d+$/.test(amountRaw)) {
    return null;
  }
  return {
    contractAddress,
    toAddress,
    fromAddress: readString(raw, 'from_address') ?? '',
    amountRaw,
  };
};

/**
 * Tronscan HTTP API client
 */
export class TronscanExplorer implements ChainExplorer {
  private readonly http: AxiosInstance;

  constructor(options: TronscanOptions, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
      });
  }

  async getTransaction(txid: string): Promise<ChainTransaction | null> {
    const body = await this.get('/transaction-info', { hash: txid });

    if (!isRecord(body) || typeof body.hash !== 'string') {
      return null;
    }

    const blockNumber = readNumber(body, 'blockNumber') ?? readNumber(body, 'block') ?? 0;
    const latest = await this.getLatestBlock();
    const transfers = Array.isArray(body.trc20TransferInfo) ? body.trc20TransferInfo : [];

    return {
      txid: body.hash,
      confirmed: body.confirmed === true,
      blockNumber,
      confirmations: latest > 0 && blockNumber > 0 ? Math.max(0, latest - blockNumber) : 0,
      timestamp: new Date(readNumber(body, 'timestamp') ?? 0),
      transfers: transfers
        .map(toTransfer)
        .filter((transfer): transfer is TokenTransfer => transfer !== null),
    };
  }

  async getLatestBlock(): Promise<number> {
    const body = await this.get('/system/status');
    const database = isRecord(body) ? readRecord(body, 'database') : undefined;
    return (database && readNumber(database, 'block')) ?? 0;
  }

  private async get(path: string, params?: Record<string, string>): Promise<unknown> {
    const endTimer = externalCallDuration.startTimer({ service: 'tronscan' });
    try {
      const response = await this.http.get<unknown>(path, { params });
      endTimer({ outcome: 'success' });
      return response.data;
    } catch (error) {
      endTimer({ outcome: 'error' });
      if (axios.isAxiosError(error)) {
        log.error({ path, status: error.response?.status, error: error.message }, 'Tronscan request failed');
        throw new ChainExplorerError(`Chain explorer request failed: ${error.message}`, error.response?.status);
      }
      throw error;
    }
  }
}
