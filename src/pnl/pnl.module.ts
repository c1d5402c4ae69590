import { Module } from '@nestjs/common';
import { PnlController } from './pnl.controller';
import { FifoEngineService } from './fifo-engine.service';
import { TokenPnlService } from './token-pnl.service';
import { WalletPnlService } from './wallet-pnl.service';
import { PnlQueryService } from './pnl-query.service';
import { LedgerModule } from '../ledger/ledger.module';

@Module({
  imports: [LedgerModule], // LEDGER_DATA_SOURCE + snapshot storage
  controllers: [PnlController],
  providers: [
    FifoEngineService,
    TokenPnlService,   // per-token FIFO + unrealized + reconciliation
    WalletPnlService,  // wallet totals
    PnlQueryService,   // ledger -> wallet PnL
  ],
})
export class PnlModule {}
