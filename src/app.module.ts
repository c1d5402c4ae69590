import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { PnlConfigModule } from './config/pnl-config.module';
import { PnlModule } from './pnl/pnl.module';

@Module({
  imports: [PnlConfigModule, PnlModule],
  controllers: [AppController],
})
export class AppModule {}
