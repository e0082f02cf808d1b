import { Inject, Injectable, Logger } from '@nestjs/common';
import { Price } from '../common/price/price';
import { InvalidArgumentException } from '../common/errors/option.exceptions';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { MarketQuoteService } from '../market-data/market-quote.service';
import { Direction } from './entities/option-components.entity';
import { CostModel, FlatCommissionCostModel } from './cost-model';
import { BidAskPremiumSource, PremiumSource, zeroPremiumFallback } from './premium-source';
import { MultiLeg } from './multi-leg';
import { ContractOptions, StrategyKind, StrategyOptions, call, collar, put, straddle, strangle } from './strategies';
import { decodeOptionSymbol, encodeOptionSymbol, optionSymbols } from './option-symbol.codec';
import { OptionQuery } from './option-query';
import { summarizePayoffs } from './payoff-analysis';
import { BuildStrategyDto } from './dto/build-strategy.dto';
import { GenerateSymbolsDto } from './dto/generate-symbols.dto';
import { OptionQueryDto } from './dto/option-query.dto';
import { DecodedSymbolDto, PayoffReportDto } from './dto/payoff-response.dto';

// Builds strategies with the configured defaults (range, tick, TTL,
// commission, premium source) and turns them into REST-friendly reports.
@Injectable()
export class OptionsService {
  private readonly logger = new Logger(OptionsService.name);
  private readonly costModel: CostModel;
  private readonly premiumSource: PremiumSource;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    quoteService: MarketQuoteService,
  ) {
    this.costModel = new FlatCommissionCostModel(config.COMMISSION_BASE_FEE, config.COMMISSION_PER_LEG_FEE);
    this.premiumSource = config.MARKET_DATA_ENABLED
      ? new BidAskPremiumSource(quoteService)
      : zeroPremiumFallback(OptionsService.name);
  }

  buildStrategy(dto: BuildStrategyDto): MultiLeg {
    const shared: StrategyOptions = {
      priceRange: dto.priceRange ?? this.config.DEFAULT_PRICE_RANGE,
      tickSize: dto.tickSize ?? this.config.DEFAULT_TICK_SIZE,
      ttlSeconds: this.config.PAYOFF_CACHE_TTL_SECONDS,
      costModel: this.costModel,
      premiumSource: this.premiumSource,
    };
    const options: ContractOptions = { ...shared, expiration: dto.expiration, strike: dto.strike };
    const direction = dto.direction ?? Direction.LONG;

    switch (dto.strategy) {
      case StrategyKind.CALL:
        return call(dto.symbol, direction, options);
      case StrategyKind.PUT:
        return put(dto.symbol, direction, options);
      case StrategyKind.STRADDLE:
        return straddle(dto.symbol, direction, options);
      case StrategyKind.STRANGLE:
        rejectSingleStrike(dto);
        return strangle(
          dto.symbol,
          requireStrike(dto.callStrike, 'callStrike'),
          requireStrike(dto.putStrike, 'putStrike'),
          direction,
          { ...shared, expiration: dto.expiration },
        );
      case StrategyKind.COLLAR:
        rejectSingleStrike(dto);
        return collar(
          dto.symbol,
          requireStrike(dto.putStrike, 'putStrike'),
          requireStrike(dto.callStrike, 'callStrike'),
          { ...shared, expiration: dto.expiration },
        );
      default:
        throw new InvalidArgumentException(`Unknown strategy: ${String(dto.strategy)}`);
    }
  }

  /**
   * Payoff curve with cost and premium applied, plus break-evens.
   * Premium lookups fail with MarketDataUnavailableException when a
   * leg has no quote.
   */
  async payoffReport(dto: BuildStrategyDto): Promise<PayoffReportDto> {
    const strategy = this.buildStrategy(dto);
    const includeCost = dto.includeCost ?? true;
    const includePremium = dto.includePremium ?? true;

    const points = await strategy.netPayoffs({ includeCost, includePremium });
    const premium = includePremium ? await strategy.premium() : Price.ZERO;
    const summary = summarizePayoffs(points);

    this.logger.debug(`Computed ${dto.strategy} payoff for ${dto.symbol}: ${points.length} points`);

    return {
      strategy: dto.strategy,
      legs: strategy.legs.map((leg) => leg.describe()),
      cost: includeCost ? strategy.cost().toNumber() : 0,
      premium: premium.toNumber(),
      breakEvens: summary.breakEvens.map((price) => price.toNumber()),
      maxProfit: summary.maxProfit.toNumber(),
      maxLoss: summary.maxLoss.toNumber(),
      points: points.map(({ price, payoff, net }) => ({
        price: price.toNumber(),
        payoff: payoff.toNumber(),
        net: net.toNumber(),
      })),
    };
  }

  generateSymbols(dto: GenerateSymbolsDto): string[] {
    return optionSymbols(dto.underlying, dto.expirations, dto.strikes, { calls: dto.calls, puts: dto.puts });
  }

  decodeSymbol(symbol: string): DecodedSymbolDto {
    const components = decodeOptionSymbol(symbol);
    return {
      symbol: encodeOptionSymbol(components.underlying, components.expiration, components.type, components.strike),
      underlying: components.underlying,
      expiration: components.expiration.toISOString().slice(0, 10),
      type: components.type,
      strike: components.strike.toNumber(),
    };
  }

  buildQuery(dto: OptionQueryDto): string {
    return OptionQuery.parse(dto.expressions, { strict: dto.strict }).serialize();
  }
}

function requireStrike(value: number | undefined, name: string): number {
  if (value === undefined) {
    throw new InvalidArgumentException(`${name} is required for this strategy`);
  }
  return value;
}

// Two-strike strategies take callStrike and putStrike only.
function rejectSingleStrike(dto: BuildStrategyDto): void {
  if (dto.strike !== undefined) {
    throw new InvalidArgumentException(`strike does not apply to ${dto.strategy}, use callStrike and putStrike`);
  }
}
