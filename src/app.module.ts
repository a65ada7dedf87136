import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import ledgerConfig from './config/ledger.config';
import { AuthModule } from './auth/auth.module';
import { DatabaseModule } from './database/database.module';
import { I18nModule } from './i18n/i18n.module';
import { LogsModule } from './logs/logs.module';
import { StockModule } from './stock/stock.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig, ledgerConfig] }),
    I18nModule,
    AuthModule,
    DatabaseModule,
    LogsModule,
    StockModule,
  ],
})
export class AppModule { }
