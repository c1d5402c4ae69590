import { Inject, Injectable, Logger } from '@nestjs/common';
import { LEDGER_DATA_SOURCE, LedgerDataSource } from '../ledger/ledger-data-source.interface';
import { TokenPnlService } from './token-pnl.service';
import { WalletPnlService } from './wallet-pnl.service';
import { WalletPnl } from './entities/wallet-pnl.entity';
import { TokenPnl } from './entities/token-pnl.entity';
import { TokenAsset } from './entities/token-asset.entity';
import { InvalidTransferError } from './pnl.errors';

// Read side: pulls balances and history from the ledger source and
// runs them through the PnL pipeline.
@Injectable()
export class PnlQueryService {
  private readonly logger = new Logger(PnlQueryService.name);

  constructor(
    @Inject(LEDGER_DATA_SOURCE) private readonly ledger: LedgerDataSource,
    private readonly tokenPnlService: TokenPnlService,
    private readonly walletPnlService: WalletPnlService,
  ) {}

  /**
   * Computes PnL for every asset the wallet holds on a chain.
   * Tokens are independent, so their histories are fetched concurrently.
   * A token with malformed history is logged and left out of the totals.
   */
  async getWalletPnl(wallet: string, chain: string): Promise<WalletPnl> {
    const balances = await this.ledger.fetchBalances(wallet, chain);

    const computed = await Promise.all(
      balances.assets.map((asset) => this.computeTokenPnl(wallet, chain, asset)),
    );
    const tokens = computed.filter((token): token is TokenPnl => token !== null);

    const result = this.walletPnlService.aggregateWalletPnl(wallet, chain, tokens);
    const flagged = tokens.filter((token) => token.hasWarnings).length;
    this.logger.log(
      `PnL for ${wallet} on ${chain}: ${tokens.length} tokens, total ${result.totalPnl}` +
        (flagged > 0 ? `, ${flagged} with warnings` : ''),
    );
    return result;
  }

  private async computeTokenPnl(wallet: string, chain: string, asset: TokenAsset): Promise<TokenPnl | null> {
    const transfers = await this.ledger.fetchTokenTransfers(wallet, chain, asset);
    try {
      return this.tokenPnlService.calculateTokenPnl(asset, transfers);
    } catch (error) {
      if (error instanceof InvalidTransferError) {
        this.logger.error(`Skipping ${asset.ticker} for ${wallet} on ${chain}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
