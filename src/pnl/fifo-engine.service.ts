import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TokenAsset } from './entities/token-asset.entity';
import { TokenTransfer, TransferType } from './entities/token-transfer.entity';
import { Lot } from './entities/lot.entity';
import { PnlWarning } from './entities/pnl-warning.entity';
import { InvalidTransferError } from './pnl.errors';
import { roundTo, scaleRawAmount, toDecimal } from '../common/utils/decimal.util';

const TRANSFER_TYPES: ReadonlySet<string> = new Set(Object.values(TransferType));
const RAW_AMOUNT = /^-?\d+$/;

export interface FifoResult {
  realizedPnl: Decimal;
  lots: Lot[];                  // oldest first
  totalInvested: Decimal;
  positionsOpened: number;
  positionsClosed: number;
  totalBoughtQty: Decimal;
  totalMatchedSoldQty: Decimal; // excludes sells beyond the queue
  warnings: PnlWarning[];
}

// FIFO cost-basis matching for one token's transfer history.
// Each run owns its lot queue; nothing is kept between calls.
@Injectable()
export class FifoEngineService {
  /**
   * Walks transfers oldest-first, opening a lot per IN and consuming the
   * oldest lots per OUT. Missing prices fall back to the token's current
   * price with a warning.
   *
   * @param transfers - must already be sorted by ascending timestamp
   * @throws InvalidTransferError on malformed or out-of-order records
   */
  run(token: TokenAsset, transfers: readonly TokenTransfer[]): FifoResult {
    transfers.forEach((transfer, index) => this.assertValid(transfer, index, transfers[index - 1]));

    const currentPrice = toDecimal(token.currentPrice);
    const queue: Lot[] = [];
    const warnings: PnlWarning[] = [];
    let realizedPnl = new Decimal(0);
    let totalInvested = new Decimal(0);
    let totalBoughtQty = new Decimal(0);
    let totalMatchedSoldQty = new Decimal(0);
    let positionsOpened = 0;
    let positionsClosed = 0;

    transfers.forEach((transfer, index) => {
      const qty = scaleRawAmount(transfer.deltaRaw, transfer.decimals);
      if (qty.lessThanOrEqualTo(0)) {
        return;
      }

      const quote = toDecimal(transfer.deltaQuote ?? 0).abs();
      const gas = toDecimal(transfer.gasQuote ?? 0);

      if (transfer.transferType === TransferType.IN) {
        positionsOpened++;

        let costPerUnit: Decimal;
        if (quote.isZero()) {
          costPerUnit = currentPrice;
          warnings.push({
            kind: 'missing_buy_price',
            message:
              `Missing price data for transfer #${index + 1} on ${transfer.timestamp.toISOString()}, ` +
              `using current price $${currentPrice.toFixed(6)}`,
            transferIndex: index,
            txHash: transfer.txHash,
            timestamp: transfer.timestamp.toISOString(),
            fallbackPrice: token.currentPrice,
          });
        } else {
          costPerUnit = quote.plus(gas).dividedBy(qty);
        }

        queue.push({ qty, costPerUnit, gasUsd: gas });
        // recorded spend only, the fallback valuation is not invested money
        totalInvested = totalInvested.plus(quote).plus(gas);
        totalBoughtQty = totalBoughtQty.plus(qty);
        return;
      }

      if (queue.length === 0) {
        warnings.push({
          kind: 'sell_without_buy',
          message: `Sell without prior buy detected (transfer #${index + 1}). Possible incomplete history.`,
          transferIndex: index,
          txHash: transfer.txHash,
        });
        return;
      }

      positionsClosed++;

      let sellValue = quote;
      if (sellValue.isZero()) {
        sellValue = qty.times(currentPrice);
        warnings.push({
          kind: 'missing_sell_price',
          message: `No sale price for transfer #${index + 1}, using current price`,
          transferIndex: index,
          txHash: transfer.txHash,
          fallbackPrice: token.currentPrice,
        });
      }

      const unitProceeds = sellValue.dividedBy(qty);
      let remaining = qty;

      while (remaining.greaterThan(0) && queue.length > 0) {
        const head = queue[0];
        const matched = Decimal.min(remaining, head.qty);

        const entryCost = matched.times(head.costPerUnit);
        const exitValue = matched.times(unitProceeds);
        const gasPortion = gas.times(matched.dividedBy(qty));
        realizedPnl = realizedPnl.plus(exitValue).minus(entryCost).minus(gasPortion);

        const left = head.qty.minus(matched);
        if (left.greaterThan(0)) {
          queue[0] = { ...head, qty: left };
        } else {
          queue.shift();
        }

        remaining = remaining.minus(matched);
        totalMatchedSoldQty = totalMatchedSoldQty.plus(matched);
      }

      // the unmatched excess is dropped, it does not book a cost-free gain
      if (remaining.greaterThan(0)) {
        warnings.push({
          kind: 'unmatched_sell',
          message:
            `Sold more than bought (${remaining.toFixed(6)} ${token.ticker} unmatched). ` +
            `History may be incomplete.`,
          transferIndex: index,
          txHash: transfer.txHash,
          unmatchedQty: roundTo(remaining, 6),
        });
      }
    });

    return {
      realizedPnl,
      lots: queue,
      totalInvested,
      positionsOpened,
      positionsClosed,
      totalBoughtQty,
      totalMatchedSoldQty,
      warnings,
    };
  }

  private assertValid(transfer: TokenTransfer, index: number, previous?: TokenTransfer): void {
    if (!(transfer.timestamp instanceof Date) || Number.isNaN(transfer.timestamp.getTime())) {
      throw new InvalidTransferError(index, 'timestamp', 'is missing or not a valid date');
    }
    if (!TRANSFER_TYPES.has(transfer.transferType)) {
      throw new InvalidTransferError(index, 'transferType', `must be IN or OUT, got ${String(transfer.transferType)}`);
    }
    if (typeof transfer.deltaRaw !== 'string' || !RAW_AMOUNT.test(transfer.deltaRaw)) {
      throw new InvalidTransferError(index, 'deltaRaw', `must be an integer string, got ${String(transfer.deltaRaw)}`);
    }
    if (!Number.isInteger(transfer.decimals) || transfer.decimals < 0) {
      throw new InvalidTransferError(index, 'decimals', `must be a non-negative integer, got ${transfer.decimals}`);
    }
    if (!Number.isFinite(transfer.deltaQuote ?? 0)) {
      throw new InvalidTransferError(index, 'deltaQuote', 'must be a finite number');
    }
    if (!Number.isFinite(transfer.gasQuote ?? 0)) {
      throw new InvalidTransferError(index, 'gasQuote', 'must be a finite number');
    }
    if ((transfer.gasQuote ?? 0) < 0) {
      throw new InvalidTransferError(index, 'gasQuote', `must not be negative, got ${transfer.gasQuote}`);
    }
    if (previous && transfer.timestamp.getTime() < previous.timestamp.getTime()) {
      throw new InvalidTransferError(index, 'timestamp', 'is earlier than the previous transfer');
    }
  }
}
