import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  Put,
} from '@nestjs/common';
import { TokenPnlService } from './token-pnl.service';
import { PnlQueryService } from './pnl-query.service';
import { LedgerSnapshotStorageService } from '../ledger/ledger-snapshot-storage.service';
import { LedgerSnapshotNotFoundError } from '../ledger/ledger.errors';
import { InvalidTransferError } from './pnl.errors';
import { LedgerSnapshotDto, TokenHistoryDto } from './dto/token-history.dto';
import { WalletPnlResponseDto } from './dto/wallet-pnl-response.dto';
import { TokenPnl } from './entities/token-pnl.entity';
import { toTokenHistory } from './pnl.mapper';
import { PNL_CONFIG, PnlConfig, SUPPORTED_CHAINS } from '../config/pnl.config';

const WALLET_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const SUPPORTED_CHAIN_SET: ReadonlySet<string> = new Set(SUPPORTED_CHAINS);

@Controller('pnl')
export class PnlController {
  constructor(
    private readonly tokenPnlService: TokenPnlService,
    private readonly queryService: PnlQueryService,
    private readonly ledgerStorage: LedgerSnapshotStorageService,
    @Inject(PNL_CONFIG) private readonly config: PnlConfig,
  ) {}

  /**
   * FIFO PnL for a single token from a supplied history.
   *
   * POST /pnl/token
   * @returns 200 with the token breakdown, 400 on malformed transfers
   */
  @Post('token')
  @HttpCode(HttpStatus.OK)
  calculateToken(@Body() body: TokenHistoryDto): TokenPnl {
    const { asset, transfers } = toTokenHistory(body);
    try {
      return this.tokenPnlService.calculateTokenPnl(asset, transfers);
    } catch (error) {
      if (error instanceof InvalidTransferError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  /**
   * Stores balances and transfer history for a wallet on a chain.
   * Replaces any previous snapshot.
   *
   * PUT /pnl/wallets/0xabc.../chains/eth-mainnet/snapshot
   */
  @Put('wallets/:wallet/chains/:chain/snapshot')
  @HttpCode(HttpStatus.OK)
  saveSnapshot(
    @Param('wallet') wallet: string,
    @Param('chain') chain: string,
    @Body() body: LedgerSnapshotDto,
  ) {
    this.assertWalletAndChain(wallet, chain);
    const updatedAt = body.updatedAt ? new Date(body.updatedAt) : new Date();
    this.ledgerStorage.saveSnapshot(wallet, chain, body.tokens.map(toTokenHistory), updatedAt);
    return {
      message: `Snapshot stored for ${wallet} on ${chain}`,
      tokens: body.tokens.length,
      updatedAt: updatedAt.toISOString(),
    };
  }

  /**
   * Wallet-level PnL from the stored snapshot.
   *
   * GET /pnl/wallets/0xabc.../chains/eth-mainnet
   */
  @Get('wallets/:wallet/chains/:chain')
  @HttpCode(HttpStatus.OK)
  async getWalletPnl(
    @Param('wallet') wallet: string,
    @Param('chain') chain: string,
  ): Promise<WalletPnlResponseDto> {
    this.assertWalletAndChain(wallet, chain);
    try {
      const result = await this.queryService.getWalletPnl(wallet, chain);
      return { ...result, quoteCurrency: this.config.quoteCurrency };
    } catch (error) {
      if (error instanceof LedgerSnapshotNotFoundError) {
        throw new NotFoundException(error.message);
      }
      throw error;
    }
  }

  /**
   * Clears all stored snapshots - test harness only.
   *
   * POST /pnl/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.ledgerStorage.clearAllData();
    return { message: 'Ledger snapshots cleared' };
  }

  private assertWalletAndChain(wallet: string, chain: string): void {
    if (!WALLET_ADDRESS.test(wallet)) {
      throw new BadRequestException(`Invalid wallet address: ${wallet}`);
    }
    if (!SUPPORTED_CHAIN_SET.has(chain)) {
      throw new BadRequestException(`Unsupported chain: ${chain}`);
    }
  }
}
