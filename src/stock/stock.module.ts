import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StockService } from './stock.service';
import { StockController } from './stock.controller';
import { LogsModule } from '../logs/logs.module';
import { LEDGER_SETTINGS } from './stock.constants';
import type { LedgerSettings } from './stock.types';

@Module({
  imports: [LogsModule],
  providers: [
    StockService,
    {
      provide: LEDGER_SETTINGS,
      useFactory: (configService: ConfigService): LedgerSettings =>
        configService.getOrThrow<LedgerSettings>('ledger'),
      inject: [ConfigService],
    },
  ],
  controllers: [StockController],
  exports: [StockService],
})
export class StockModule {}
