export interface TokenTransfer {
  contractAddress: string;
  fromAddress: string;
  toAddress: string;
  /** Integer amount in the token's smallest unit */
  amountRaw: string;
}

export interface ChainTransaction {
  txid: string;
  confirmed: boolean;
  blockNumber: number;
  confirmations: number;
  timestamp: Date;
  transfers: TokenTransfer[];
}

/**
 * Read-only view of the chain used to verify one deposit at a time
 */
export interface ChainExplorer {
  /** null when the explorer does not know the transaction */
  getTransaction(txid: string): Promise<ChainTransaction | null>;
  getLatestBlock(): Promise<number>;
}

export class ChainExplorerError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ChainExplorerError';
  }
}
