import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MarketDataModule } from './market-data/market-data.module';
import { OptionsModule } from './options/options.module';

@Module({
  imports: [ConfigModule, MarketDataModule, OptionsModule],
  controllers: [AppController],
})
export class AppModule {}
