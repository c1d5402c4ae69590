import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PNL_CONFIG, PnlConfig } from './config/pnl.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = app.get<PnlConfig>(PNL_CONFIG);
  await app.listen(config.port);
  Logger.log(
    `Wallet PnL service listening on :${config.port} (quote ${config.quoteCurrency}, tolerance ${config.priceTolerance})`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
