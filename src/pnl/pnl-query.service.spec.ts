import { Logger, Provider } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { PnlQueryService } from './pnl-query.service';
import { FifoEngineService } from './fifo-engine.service';
import { TokenPnlService } from './token-pnl.service';
import { WalletPnlService } from './wallet-pnl.service';
import { LedgerSnapshotStorageService, TokenHistory } from '../ledger/ledger-snapshot-storage.service';
import { LEDGER_DATA_SOURCE, LedgerDataSource } from '../ledger/ledger-data-source.interface';
import { LedgerSnapshotNotFoundError } from '../ledger/ledger.errors';
import { TransferType } from './entities/token-transfer.entity';
import { DEFAULT_PNL_CONFIG, PNL_CONFIG } from '../config/pnl.config';

describe('PnlQueryService', () => {
  const wallet = '0x1111111111111111111111111111111111111111';

  const ethHistory: TokenHistory = {
    asset: { ticker: 'ETH', address: '', balance: 30, currentPrice: 2500, currentValue: 75000, native: true },
    transfers: [
      // stored newest first on purpose
      {
        txHash: '0xsell',
        timestamp: new Date('2024-03-01T00:00:00.000Z'),
        transferType: TransferType.OUT,
        deltaRaw: '-120',
        deltaQuote: -240_000,
        gasQuote: 0,
        decimals: 0,
      },
      {
        txHash: '0xbuy2',
        timestamp: new Date('2024-02-01T00:00:00.000Z'),
        transferType: TransferType.IN,
        deltaRaw: '50',
        deltaQuote: 75_000,
        gasQuote: 0,
        decimals: 0,
      },
      {
        txHash: '0xbuy1',
        timestamp: new Date('2024-01-01T00:00:00.000Z'),
        transferType: TransferType.IN,
        deltaRaw: '100',
        deltaQuote: 100_000,
        gasQuote: 0,
        decimals: 0,
      },
    ],
  };

  const usdcHistory: TokenHistory = {
    asset: {
      ticker: 'USDC',
      address: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
      balance: 100,
      currentPrice: 1,
      currentValue: 100,
      native: false,
    },
    transfers: [
      {
        txHash: '0xusdc',
        timestamp: new Date('2024-01-15T00:00:00.000Z'),
        transferType: TransferType.IN,
        deltaRaw: '100000000',
        deltaQuote: 100,
        gasQuote: 0,
        decimals: 6,
      },
    ],
  };

  const createModule = (ledgerProvider: Provider) =>
    Test.createTestingModule({
      providers: [
        LedgerSnapshotStorageService,
        ledgerProvider,
        FifoEngineService,
        TokenPnlService,
        WalletPnlService,
        PnlQueryService,
        { provide: PNL_CONFIG, useValue: DEFAULT_PNL_CONFIG },
      ],
    }).compile();

  describe('with stored snapshots', () => {
    let service: PnlQueryService;
    let storage: LedgerSnapshotStorageService;

    beforeEach(async () => {
      const module: TestingModule = await createModule({
        provide: LEDGER_DATA_SOURCE,
        useExisting: LedgerSnapshotStorageService,
      });
      service = module.get<PnlQueryService>(PnlQueryService);
      storage = module.get<LedgerSnapshotStorageService>(LedgerSnapshotStorageService);
      storage.saveSnapshot(wallet, 'eth-mainnet', [ethHistory, usdcHistory]);
    });

    afterEach(() => {
      storage.clearAllData();
    });

    it('should compute wallet totals from every held token', async () => {
      const result = await service.getWalletPnl(wallet, 'eth-mainnet');

      expect(result.tokens.map((t) => t.ticker)).toEqual(['ETH', 'USDC']);
      expect(result.tokens[0].realizedPnl).toBe(110_000);
      expect(result.tokens[1].avgCostBasis).toBe(1);
      expect(result.totalInvested).toBe(175_100);
      expect(result.totalCurrentValue).toBe(75_100);
      expect(result.totalRealizedPnl).toBe(110_000);
      expect(result.totalUnrealizedPnl).toBe(30_000);
      expect(result.totalPnl).toBe(140_000);
      expect(result.totalRoiPercent).toBe(5.71);
    });

    it('should leave a token with malformed history out of the totals', async () => {
      const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const broken: TokenHistory = {
        asset: { ...usdcHistory.asset, ticker: 'BAD', address: '0x2222222222222222222222222222222222222222' },
        transfers: [{ ...usdcHistory.transfers[0], txHash: '0xbad', decimals: -1 }],
      };
      storage.saveSnapshot(wallet, 'eth-mainnet', [ethHistory, broken]);

      const result = await service.getWalletPnl(wallet, 'eth-mainnet');

      expect(result.tokens.map((t) => t.ticker)).toEqual(['ETH']);
      expect(result.totalPnl).toBe(140_000);
      expect(error).toHaveBeenCalledWith(
        `Skipping BAD for ${wallet} on eth-mainnet: ` +
          'Invalid transfer #1: decimals must be a non-negative integer, got -1',
      );
      error.mockRestore();
    });

    it('should reject when no snapshot exists', async () => {
      await expect(service.getWalletPnl(wallet, 'bsc-mainnet')).rejects.toThrow(LedgerSnapshotNotFoundError);
    });
  });

  describe('with a custom data source', () => {
    it('should use whatever source is bound to the ledger token', async () => {
      const source: LedgerDataSource = {
        fetchBalances: jest.fn(async () => ({
          wallet,
          chain: 'base-mainnet',
          updatedAt: new Date('2024-06-01T00:00:00.000Z'),
          assets: [usdcHistory.asset],
        })),
        fetchTokenTransfers: jest.fn(async () => usdcHistory.transfers),
      };
      const module = await createModule({ provide: LEDGER_DATA_SOURCE, useValue: source });
      const service = module.get<PnlQueryService>(PnlQueryService);

      const result = await service.getWalletPnl(wallet, 'base-mainnet');

      expect(source.fetchTokenTransfers).toHaveBeenCalledWith(wallet, 'base-mainnet', usdcHistory.asset);
      expect(result.chain).toBe('base-mainnet');
      expect(result.totalInvested).toBe(100);
      expect(result.totalPnl).toBe(0);
    });
  });
});
