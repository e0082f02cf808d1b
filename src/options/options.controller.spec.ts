import { Test, TestingModule } from '@nestjs/testing';
import { APP_CONFIG, loadConfig } from '../config/app.config';
import { MarketQuoteService } from '../market-data/market-quote.service';
import { MalformedSymbolException } from '../common/errors/option.exceptions';
import { OptionsController } from './options.controller';
import { OptionsService } from './options.service';
import { StrategyKind } from './strategies';

describe('OptionsController', () => {
  let controller: OptionsController;
  let quoteService: MarketQuoteService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [OptionsController],
      providers: [{ provide: APP_CONFIG, useValue: loadConfig({}) }, MarketQuoteService, OptionsService],
    }).compile();

    controller = module.get<OptionsController>(OptionsController);
    quoteService = module.get<MarketQuoteService>(MarketQuoteService);
  });

  afterEach(() => {
    quoteService.clearAllQuotes();
  });

  describe('payoff', () => {
    it('should return a straddle report', async () => {
      quoteService.updateQuotes({
        F160617P00150000: { bid: 1, ask: 1.4 },
        F160617C00150000: { bid: 2, ask: 2.6 },
      });

      const result = await controller.payoff({
        strategy: StrategyKind.STRADDLE,
        symbol: 'F160617C00150000',
        tickSize: 1,
      });

      expect(result.legs.map((leg) => leg.symbol)).toEqual(['F160617P00150000', 'F160617C00150000']);
      expect(result.premium).toBe(3.5);
      expect(result.cost).toBe(6.25);
      expect(result.points[20]).toEqual({ price: 150, payoff: 0, net: -9.75 });
      expect(result.breakEvens).toEqual([140.25, 159.75]);
    });
  });

  describe('generateSymbols', () => {
    it('should return the symbols with their count', () => {
      const result = controller.generateSymbols({
        underlying: 'F',
        expirations: ['2016-06-17'],
        strikes: [150],
      });

      expect(result).toEqual({ count: 2, symbols: ['F160617C00150000', 'F160617P00150000'] });
    });
  });

  describe('decodeSymbol', () => {
    it('should decode a symbol from the path', () => {
      expect(controller.decodeSymbol('F160617P00012500')).toEqual({
        symbol: 'F160617P00012500',
        underlying: 'F',
        expiration: '2016-06-17',
        type: 'P',
        strike: 12.5,
      });
    });

    it('should reject a malformed symbol', () => {
      expect(() => controller.decodeSymbol('F1606')).toThrow(MalformedSymbolException);
    });
  });

  describe('buildQuery', () => {
    it('should wrap the serialized query', () => {
      expect(controller.buildQuery({ expressions: ['xyear = 2016'] })).toEqual({ query: 'xyear-eq:2016' });
    });
  });
});
