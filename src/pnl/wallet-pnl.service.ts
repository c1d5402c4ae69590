import { Injectable } from '@nestjs/common';
import { TokenPnl } from './entities/token-pnl.entity';
import { WalletPnl } from './entities/wallet-pnl.entity';
import { calculateRoi, roundTo, sum } from '../common/utils/decimal.util';

// Folds per-token results into wallet totals. Pure summation.
@Injectable()
export class WalletPnlService {
  /** Empty token list yields all-zero totals. */
  aggregateWalletPnl(wallet: string, chain: string, tokens: readonly TokenPnl[]): WalletPnl {
    const totalInvested = sum(tokens.map((t) => t.totalInvested));
    const totalCurrentValue = sum(tokens.map((t) => t.currentValue));
    const totalRealizedPnl = sum(tokens.map((t) => t.realizedPnl));
    const totalUnrealizedPnl = sum(tokens.map((t) => t.unrealizedPnl));

    const totalRoiPercent = totalInvested.greaterThan(0)
      ? calculateRoi(totalInvested, totalCurrentValue.plus(totalRealizedPnl))
      : 0;

    return {
      wallet,
      chain,
      tokens: [...tokens],
      totalInvested: roundTo(totalInvested, 2),
      totalCurrentValue: roundTo(totalCurrentValue, 2),
      totalRealizedPnl: roundTo(totalRealizedPnl, 2),
      totalUnrealizedPnl: roundTo(totalUnrealizedPnl, 2),
      totalPnl: roundTo(totalRealizedPnl.plus(totalUnrealizedPnl), 2),
      totalRoiPercent: roundTo(totalRoiPercent, 2),
    };
  }
}
