import { TokenAsset, WalletBalances } from '../pnl/entities/token-asset.entity';
import { TokenTransfer } from '../pnl/entities/token-transfer.entity';

export const LEDGER_DATA_SOURCE = 'LEDGER_DATA_SOURCE';

// Source of balances and transfer history. The PnL core only depends on
// this seam; remote indexers bind their own implementation to the token.
export interface LedgerDataSource {
  /** Current non-spam, non-zero holdings. */
  fetchBalances(wallet: string, chain: string): Promise<WalletBalances>;

  /** Transfers for one token, in any order. */
  fetchTokenTransfers(wallet: string, chain: string, token: TokenAsset): Promise<TokenTransfer[]>;
}
