import { Test, TestingModule } from '@nestjs/testing';
import { WalletPnlService } from './wallet-pnl.service';
import { TokenPnl } from './entities/token-pnl.entity';

describe('WalletPnlService', () => {
  let service: WalletPnlService;

  const createTokenPnl = (overrides: Partial<TokenPnl>): TokenPnl => ({
    ticker: 'ETH',
    address: '',
    currentBalance: 1,
    currentPrice: 1,
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
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [WalletPnlService],
    }).compile();

    service = module.get<WalletPnlService>(WalletPnlService);
  });

  it('should sum token figures into wallet totals', () => {
    const eth = createTokenPnl({ totalInvested: 1000, currentValue: 1500, realizedPnl: 200, unrealizedPnl: 300 });
    const usdc = createTokenPnl({
      ticker: 'USDC',
      totalInvested: 500.5,
      currentValue: 250.25,
      realizedPnl: -50.1,
      unrealizedPnl: 10.2,
    });

    const result = service.aggregateWalletPnl('0xwallet', 'eth-mainnet', [eth, usdc]);

    expect(result).toEqual({
      wallet: '0xwallet',
      chain: 'eth-mainnet',
      tokens: [eth, usdc],
      totalInvested: 1500.5,
      totalCurrentValue: 1750.25,
      totalRealizedPnl: 149.9,
      totalUnrealizedPnl: 310.2,
      totalPnl: 460.1,
      totalRoiPercent: 26.63,   // (1750.25 + 149.9 - 1500.5) / 1500.5
    });
  });

  it('should return zero totals for an empty wallet', () => {
    expect(service.aggregateWalletPnl('0xwallet', 'base-mainnet', [])).toEqual({
      wallet: '0xwallet',
      chain: 'base-mainnet',
      tokens: [],
      totalInvested: 0,
      totalCurrentValue: 0,
      totalRealizedPnl: 0,
      totalUnrealizedPnl: 0,
      totalPnl: 0,
      totalRoiPercent: 0,
    });
  });

  it('should report zero ROI when nothing was invested', () => {
    const airdrop = createTokenPnl({ currentValue: 40, unrealizedPnl: 40 });

    const result = service.aggregateWalletPnl('0xwallet', 'eth-mainnet', [airdrop]);

    expect(result.totalPnl).toBe(40);
    expect(result.totalRoiPercent).toBe(0);
  });

  it('should aggregate a token list longer than the argument limit', () => {
    const token = createTokenPnl({ totalInvested: 1, currentValue: 2, unrealizedPnl: 1 });
    const tokens = new Array<TokenPnl>(200_000).fill(token);

    const result = service.aggregateWalletPnl('0xwallet', 'eth-mainnet', tokens);

    expect(result.totalInvested).toBe(200_000);
    expect(result.totalCurrentValue).toBe(400_000);
    expect(result.totalPnl).toBe(200_000);
    expect(result.totalRoiPercent).toBe(100);
  });
});
