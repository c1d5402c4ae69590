// Current holding snapshot for one token, as reported by the ledger source.
// Balance is already scaled by the token's decimals.
export interface TokenAsset {
  ticker: string;
  address: string;          // contract address, empty for native assets
  balance: number;
  currentPrice: number;     // quote currency per unit
  currentValue: number;     // balance * currentPrice
  native: boolean;
  decimals?: number;
}

// Balances for one wallet on one chain.
export interface WalletBalances {
  wallet: string;
  chain: string;
  updatedAt: Date;
  assets: TokenAsset[];
}
