import { Module } from '@nestjs/common';
import { MarketQuoteService } from './market-quote.service';
import { MarketDataController } from './market-data.controller';

@Module({
  controllers: [MarketDataController],
  providers: [MarketQuoteService],
  exports: [MarketQuoteService],
})
export class MarketDataModule {}
