import { Test, TestingModule } from '@nestjs/testing';
import { InvalidArgumentException, MarketDataUnavailableException } from '../common/errors/option.exceptions';
import { APP_CONFIG, AppConfig, loadConfig } from '../config/app.config';
import { MarketQuoteService } from '../market-data/market-quote.service';
import { Direction } from './entities/option-components.entity';
import { OptionsService } from './options.service';
import { StrategyKind } from './strategies';
import { BuildStrategyDto } from './dto/build-strategy.dto';

describe('OptionsService', () => {
  let service: OptionsService;
  let quoteService: MarketQuoteService;

  const createService = async (config: AppConfig) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [{ provide: APP_CONFIG, useValue: config }, MarketQuoteService, OptionsService],
    }).compile();

    service = module.get<OptionsService>(OptionsService);
    quoteService = module.get<MarketQuoteService>(MarketQuoteService);
  };

  const createStrategyDto = (overrides: Partial<BuildStrategyDto>): BuildStrategyDto => {
    return {
      strategy: StrategyKind.CALL,
      symbol: 'F160617C00150000',
      tickSize: 1,
      ...overrides,
    };
  };

  beforeEach(async () => {
    await createService(loadConfig({}));
  });

  afterEach(() => {
    quoteService.clearAllQuotes();
  });

  describe('buildStrategy', () => {
    it('should apply configured defaults', () => {
      const strategy = service.buildStrategy({ strategy: StrategyKind.PUT, symbol: 'F160617C00150000' });
      const [leg] = strategy.legs;

      expect(leg.symbol).toBe('F160617P00150000');
      expect(leg.domain.tick.toNumber()).toBe(0.01);
      expect(leg.domain.start.toNumber()).toBe(130);
      expect(strategy.cost().toNumber()).toBe(5.6);
    });

    it('should honor direction, expiration and strike', () => {
      const strategy = service.buildStrategy(
        createStrategyDto({ symbol: 'F', direction: Direction.SHORT, expiration: '2016-06-17', strike: 150 }),
      );
      const [leg] = strategy.legs;

      expect(leg.symbol).toBe('F160617C00150000');
      expect(leg.direction).toBe(Direction.SHORT);
    });

    it('should build every strategy kind', () => {
      const legCount = (strategy: StrategyKind) =>
        service.buildStrategy(createStrategyDto({ strategy, callStrike: 160, putStrike: 140 })).size;

      expect(legCount(StrategyKind.CALL)).toBe(1);
      expect(legCount(StrategyKind.PUT)).toBe(1);
      expect(legCount(StrategyKind.STRADDLE)).toBe(2);
      expect(legCount(StrategyKind.STRANGLE)).toBe(2);
      expect(legCount(StrategyKind.COLLAR)).toBe(2);
    });

    it('should require both strikes for a strangle', () => {
      expect(() => service.buildStrategy(createStrategyDto({ strategy: StrategyKind.STRANGLE, putStrike: 140 }))).toThrow(
        new InvalidArgumentException('callStrike is required for this strategy'),
      );
      expect(() => service.buildStrategy(createStrategyDto({ strategy: StrategyKind.COLLAR, callStrike: 160 }))).toThrow(
        'putStrike is required for this strategy',
      );
    });

    it('should reject a single strike for two-strike strategies', () => {
      expect(() =>
        service.buildStrategy(
          createStrategyDto({ strategy: StrategyKind.COLLAR, strike: 100, putStrike: 90, callStrike: 110 }),
        ),
      ).toThrow(new InvalidArgumentException('strike does not apply to collar, use callStrike and putStrike'));
      expect(() =>
        service.buildStrategy(
          createStrategyDto({ strategy: StrategyKind.STRANGLE, strike: 150, putStrike: 140, callStrike: 160 }),
        ),
      ).toThrow(InvalidArgumentException);
    });
  });

  describe('payoffReport', () => {
    it('should report a long call priced from the quote book', async () => {
      quoteService.updateQuote('F160617C00150000', { bid: 2, ask: 3 });

      const report = await service.payoffReport(createStrategyDto({}));

      expect(report.strategy).toBe(StrategyKind.CALL);
      expect(report.legs).toEqual([
        {
          symbol: 'F160617C00150000',
          underlying: 'F',
          expiration: '20160617',
          type: 'C',
          direction: 'L',
          strike: 150,
        },
      ]);
      expect(report.premium).toBe(2.5);
      expect(report.cost).toBe(5.6);
      expect(report.points).toHaveLength(41);
      expect(report.points[0]).toEqual({ price: 130, payoff: 0, net: -8.1 });
      expect(report.points[40]).toEqual({ price: 170, payoff: 20, net: 11.9 });
      expect(report.breakEvens).toEqual([158.1]);
      expect(report.maxProfit).toBe(11.9);
      expect(report.maxLoss).toBe(-8.1);
    });

    it('should fail when a leg has no quote', async () => {
      await expect(service.payoffReport(createStrategyDto({}))).rejects.toThrow(MarketDataUnavailableException);
    });

    it('should skip the premium lookup when excluded', async () => {
      const report = await service.payoffReport(
        createStrategyDto({
          strategy: StrategyKind.COLLAR,
          symbol: 'F160617C00100000',
          putStrike: 90,
          callStrike: 110,
          includePremium: false,
        }),
      );

      expect(report.premium).toBe(0);
      expect(report.cost).toBe(6.25);
      expect(report.points).toHaveLength(61);
      expect(report.points[0]).toEqual({ price: 70, payoff: 20, net: 13.75 });
      expect(report.breakEvens).toEqual([83.75]);
      expect(report.maxProfit).toBe(13.75);
      expect(report.maxLoss).toBe(-26.25);
    });

    it('should report gross payoffs when cost is excluded too', async () => {
      const report = await service.payoffReport(createStrategyDto({ includeCost: false, includePremium: false }));

      expect(report.cost).toBe(0);
      expect(report.maxLoss).toBe(0);
      expect(report.maxProfit).toBe(20);
    });

    it('should price premiums at zero when market data is disabled', async () => {
      await createService(loadConfig({ MARKET_DATA_ENABLED: 'false' }));

      const report = await service.payoffReport(createStrategyDto({}));

      expect(report.premium).toBe(0);
      expect(report.points[40].net).toBe(14.4);
    });
  });

  describe('generateSymbols', () => {
    it('should list calls before puts for each expiration', () => {
      const symbols = service.generateSymbols({
        underlying: 'f',
        expirations: ['2016-06-17', '20160715'],
        strikes: [150, 155],
        puts: false,
      });

      expect(symbols).toEqual(['F160617C00150000', 'F160617C00155000', 'F160715C00150000', 'F160715C00155000']);
    });
  });

  describe('decodeSymbol', () => {
    it('should split a symbol into its parts', () => {
      expect(service.decodeSymbol('F160617C00150000')).toEqual({
        symbol: 'F160617C00150000',
        underlying: 'F',
        expiration: '2016-06-17',
        type: 'C',
        strike: 150,
      });
    });
  });

  describe('buildQuery', () => {
    it('should drop unknown filters unless strict', () => {
      expect(service.buildQuery({ expressions: ['strikeprice > 100', 'volume > 5'] })).toBe('strikeprice-gt:100');
      expect(() => service.buildQuery({ expressions: ['volume > 5'], strict: true })).toThrow(InvalidArgumentException);
    });
  });
});
