import { WalletPnl } from '../entities/wallet-pnl.entity';

// Wallet totals plus the label of the currency all amounts are quoted in
export interface WalletPnlResponseDto extends WalletPnl {
  quoteCurrency: string;
}
