export enum TransferType {
  IN = 'IN',
  OUT = 'OUT',
}

// One ledger event moving the token in or out of the wallet.
// deltaRaw is an integer string in the smallest unit; its sign is ignored,
// direction comes from transferType.
export interface TokenTransfer {
  txHash: string;
  timestamp: Date;
  transferType: TransferType;
  deltaRaw: string;
  deltaQuote: number | null;   // quote value at transfer time, null/0 = unknown
  gasQuote: number | null;     // fee paid, quote currency
  decimals: number;
}
