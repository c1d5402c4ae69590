import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PNL_CONFIG, PnlConfig, validatePnlConfig } from './pnl.config';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: PNL_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): PnlConfig =>
        validatePnlConfig({
          NODE_ENV: configService.get<string>('NODE_ENV'),
          PORT: configService.get<string>('PORT'),
          PNL_PRICE_TOLERANCE: configService.get<string>('PNL_PRICE_TOLERANCE'),
          PNL_QUOTE_CURRENCY: configService.get<string>('PNL_QUOTE_CURRENCY'),
          PNL_VERBOSE: configService.get<string>('PNL_VERBOSE'),
        }),
    },
  ],
  exports: [PNL_CONFIG],
})
export class PnlConfigModule {}
