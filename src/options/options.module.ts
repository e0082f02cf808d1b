import { Module } from '@nestjs/common';
import { OptionsController } from './options.controller';
import { OptionsService } from './options.service';
import { MarketDataModule } from '../market-data/market-data.module';

@Module({
  imports: [MarketDataModule], // MarketQuoteService backs bid/ask premiums
  controllers: [OptionsController],
  providers: [OptionsService],
})
export class OptionsModule {}
