import { Injectable, Logger } from '@nestjs/common';
import { TokenAsset, WalletBalances } from '../pnl/entities/token-asset.entity';
import { TokenTransfer } from '../pnl/entities/token-transfer.entity';
import { LedgerDataSource } from './ledger-data-source.interface';
import { LedgerSnapshotNotFoundError } from './ledger.errors';

export interface TokenHistory {
  asset: TokenAsset;
  transfers: TokenTransfer[];
}

interface LedgerSnapshot {
  updatedAt: Date;
  assets: TokenAsset[];
  transfersByToken: Map<string, TokenTransfer[]>;
}

// In-memory ledger snapshots pushed by clients.
// Wallets compare case-insensitively; tokens keyed by contract address,
// or by ticker for native assets.
@Injectable()
export class LedgerSnapshotStorageService implements LedgerDataSource {
  private readonly logger = new Logger(LedgerSnapshotStorageService.name);
  private snapshots: Map<string, LedgerSnapshot> = new Map();

  /** Replaces whatever was stored for this wallet + chain */
  saveSnapshot(wallet: string, chain: string, tokens: TokenHistory[], updatedAt: Date = new Date()): void {
    const transfersByToken = new Map<string, TokenTransfer[]>();
    tokens.forEach(({ asset, transfers }) => {
      const key = tokenKey(asset);
      const existing = transfersByToken.get(key) ?? [];
      transfersByToken.set(key, [...existing, ...transfers.map((transfer) => ({ ...transfer }))]);
    });

    this.snapshots.set(snapshotKey(wallet, chain), {
      updatedAt,
      assets: tokens.map(({ asset }) => ({ ...asset })),
      transfersByToken,
    });
    this.logger.debug(`Stored snapshot for ${wallet} on ${chain}: ${tokens.length} tokens`);
  }

  hasSnapshot(wallet: string, chain: string): boolean {
    return this.snapshots.has(snapshotKey(wallet, chain));
  }

  async fetchBalances(wallet: string, chain: string): Promise<WalletBalances> {
    const snapshot = this.getSnapshot(wallet, chain);
    return {
      wallet,
      chain,
      updatedAt: snapshot.updatedAt,
      assets: snapshot.assets.map((asset) => ({ ...asset })),
    };
  }

  /** Returns defensive copy to prevent external mutation */
  async fetchTokenTransfers(wallet: string, chain: string, token: TokenAsset): Promise<TokenTransfer[]> {
    const snapshot = this.getSnapshot(wallet, chain);
    const transfers = snapshot.transfersByToken.get(tokenKey(token)) ?? [];
    return transfers.map((transfer) => ({ ...transfer }));
  }

  /** Nukes all snapshots - test harness only */
  clearAllData(): void {
    this.snapshots.clear();
  }

  private getSnapshot(wallet: string, chain: string): LedgerSnapshot {
    const snapshot = this.snapshots.get(snapshotKey(wallet, chain));
    if (!snapshot) {
      throw new LedgerSnapshotNotFoundError(wallet, chain);
    }
    return snapshot;
  }
}

function snapshotKey(wallet: string, chain: string): string {
  return `${chain}:${wallet.toLowerCase()}`;
}

function tokenKey(asset: TokenAsset): string {
  return asset.native || !asset.address ? `native:${asset.ticker}` : asset.address.toLowerCase();
}
