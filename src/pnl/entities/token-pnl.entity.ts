import { PnlWarning } from './pnl-warning.entity';

// PnL breakdown for a single token. Money rounded to 2 places,
// quantities and prices to 6.
export interface TokenPnl {
  ticker: string;
  address: string;
  currentBalance: number;
  currentPrice: number;
  currentValue: number;
  avgCostBasis: number;      // per unit, remaining lots only
  totalInvested: number;     // all IN value + gas, not reduced by sales
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  roiPercent: number;
  positionsOpened: number;
  positionsClosed: number;
  hasWarnings: boolean;
  warnings: PnlWarning[];
}
