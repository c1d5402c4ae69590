import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { FifoEngineService } from './fifo-engine.service';
import { TokenAsset } from './entities/token-asset.entity';
import { TokenTransfer } from './entities/token-transfer.entity';
import { TokenPnl } from './entities/token-pnl.entity';
import { PnlWarning } from './entities/pnl-warning.entity';
import { PNL_CONFIG, PnlConfig } from '../config/pnl.config';
import {
  calculateRoi,
  isApproximatelyEqual,
  roundTo,
  safeDivide,
  sum,
  toDecimal,
} from '../common/utils/decimal.util';

interface TokenPnlFigures {
  avgCostBasis: Decimal;
  totalInvested: Decimal;
  realizedPnl: Decimal;
  unrealizedPnl: Decimal;
  positionsOpened: number;
  positionsClosed: number;
  warnings: PnlWarning[];
}

// Turns FIFO engine output into a per-token PnL with unrealized gains,
// balance reconciliation and ROI. Rounding happens only in toResult().
@Injectable()
export class TokenPnlService {
  private readonly logger = new Logger(TokenPnlService.name);

  constructor(
    private readonly fifoEngine: FifoEngineService,
    @Inject(PNL_CONFIG) private readonly config: PnlConfig,
  ) {}

  /**
   * Calculates realized and unrealized PnL for one token.
   * Transfers may arrive in any order; a sorted copy is processed.
   *
   * @throws InvalidTransferError on malformed transfer records
   */
  calculateTokenPnl(token: TokenAsset, transfers: readonly TokenTransfer[]): TokenPnl {
    const balance = toDecimal(token.balance);

    // nothing held: history is irrelevant
    if (balance.isZero()) {
      return this.emptyResult(token);
    }

    if (transfers.length === 0) {
      const result = this.toResult(token, {
        avgCostBasis: new Decimal(0),
        totalInvested: new Decimal(0),
        realizedPnl: new Decimal(0),
        unrealizedPnl: toDecimal(token.currentValue),
        positionsOpened: 0,
        positionsClosed: 0,
        warnings: [
          {
            kind: 'no_transfer_history',
            message: `No transfer history found but balance exists (${balance.toFixed(6)})`,
            balance: roundTo(balance, 6),
          },
        ],
      });
      this.logWarnings(result);
      return result;
    }

    const ordered = sortChronologically(transfers);
    const fifo = this.fifoEngine.run(token, ordered);
    const warnings = [...fifo.warnings];

    const remainingQty = sum(fifo.lots.map((lot) => lot.qty));
    const remainingCost = sum(fifo.lots.map((lot) => lot.qty.times(lot.costPerUnit)));

    const tolerance = balance.times(this.config.priceTolerance);
    if (!isApproximatelyEqual(remainingQty, balance, tolerance)) {
      const difference = remainingQty.minus(balance).abs();
      const percentage = difference.dividedBy(balance).times(100);
      warnings.push({
        kind: 'balance_mismatch',
        message:
          `Balance mismatch: Queue=${remainingQty.toFixed(6)}, ` +
          `Actual=${balance.toFixed(6)}, ` +
          `Diff=${difference.toFixed(6)} (${percentage.toFixed(2)}%)`,
        queueBalance: roundTo(remainingQty, 6),
        actualBalance: roundTo(balance, 6),
        difference: roundTo(difference, 6),
        percentage: roundTo(percentage, 2),
      });
    }

    const avgCostBasis = safeDivide(remainingCost, remainingQty);
    // reported balance, not queue quantity, so reconciliation gaps stay out of the figure
    const unrealizedPnl = toDecimal(token.currentPrice).minus(avgCostBasis).times(balance);

    const result = this.toResult(token, {
      avgCostBasis,
      totalInvested: fifo.totalInvested,
      realizedPnl: fifo.realizedPnl,
      unrealizedPnl,
      positionsOpened: fifo.positionsOpened,
      positionsClosed: fifo.positionsClosed,
      warnings,
    });
    this.logWarnings(result);
    return result;
  }

  private toResult(token: TokenAsset, figures: TokenPnlFigures): TokenPnl {
    const currentValue = toDecimal(token.currentValue);
    const totalPnl = figures.realizedPnl.plus(figures.unrealizedPnl);
    const roiPercent = figures.totalInvested.greaterThan(0)
      ? calculateRoi(figures.totalInvested, currentValue.plus(figures.realizedPnl))
      : new Decimal(0);

    return {
      ticker: token.ticker,
      address: token.address,
      currentBalance: roundTo(token.balance, 6),
      currentPrice: roundTo(token.currentPrice, 6),
      currentValue: roundTo(currentValue, 2),
      avgCostBasis: roundTo(figures.avgCostBasis, 6),
      totalInvested: roundTo(figures.totalInvested, 2),
      realizedPnl: roundTo(figures.realizedPnl, 2),
      unrealizedPnl: roundTo(figures.unrealizedPnl, 2),
      totalPnl: roundTo(totalPnl, 2),
      roiPercent: roundTo(roiPercent, 2),
      positionsOpened: figures.positionsOpened,
      positionsClosed: figures.positionsClosed,
      hasWarnings: figures.warnings.length > 0,
      warnings: figures.warnings,
    };
  }

  private emptyResult(token: TokenAsset): TokenPnl {
    return {
      ticker: token.ticker,
      address: token.address,
      currentBalance: 0,
      currentPrice: roundTo(token.currentPrice, 6),
      currentValue: 0,
      avgCostBasis: 0,
      totalInvested: 0,
      realizedPnl: 0,
      unrealizedPnl: 0,
      totalPnl: 0,
      roiPercent: 0,
      positionsOpened: 0,
      positionsClosed: 0,
      hasWarnings: false,
      warnings: [],
    };
  }

  private logWarnings(result: TokenPnl): void {
    if (!this.config.verbose) {
      return;
    }
    result.warnings.forEach((warning) => this.logger.warn(`${result.ticker}: ${warning.message}`));
  }
}

/** Stable ascending sort by timestamp; ties keep their input order. */
export function sortChronologically(transfers: readonly TokenTransfer[]): TokenTransfer[] {
  return [...transfers].sort((a, b) => timeOf(a) - timeOf(b));
}

// invalid dates sort as NaN and are rejected by the engine afterwards
function timeOf(transfer: TokenTransfer): number {
  return transfer.timestamp instanceof Date ? transfer.timestamp.getTime() : Number.NaN;
}
