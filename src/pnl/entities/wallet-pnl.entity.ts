import { TokenPnl } from './token-pnl.entity';

// Per wallet + chain totals folded from token results.
export interface WalletPnl {
  wallet: string;
  chain: string;
  tokens: TokenPnl[];
  totalInvested: number;
  totalCurrentValue: number;
  totalRealizedPnl: number;
  totalUnrealizedPnl: number;
  totalPnl: number;
  totalRoiPercent: number;
}
