import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse, ServiceIndex } from './common/interfaces/health.interface';
import { PNL_CONFIG, PnlConfig, SUPPORTED_CHAINS } from './config/pnl.config';

const SERVICE_NAME = 'wallet-pnl-service';

@Controller()
export class AppController {
  constructor(@Inject(PNL_CONFIG) private readonly config: PnlConfig) {}

  /**
   * Liveness check, reports the quote currency figures are labelled with.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
      quoteCurrency: this.config.quoteCurrency,
    };
  }

  /**
   * Chains and PnL routes this service answers.
   *
   * GET /
   */
  @Get()
  getIndex(): ServiceIndex {
    return {
      service: SERVICE_NAME,
      supportedChains: SUPPORTED_CHAINS,
      endpoints: {
        tokenPnl: 'POST /pnl/token',
        saveSnapshot: 'PUT /pnl/wallets/:wallet/chains/:chain/snapshot',
        walletPnl: 'GET /pnl/wallets/:wallet/chains/:chain',
        reset: 'POST /pnl/reset',
      },
    };
  }
}
