import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { OptionsService } from './options.service';
import { BuildStrategyDto } from './dto/build-strategy.dto';
import { GenerateSymbolsDto } from './dto/generate-symbols.dto';
import { OptionQueryDto } from './dto/option-query.dto';
import { DecodedSymbolDto, PayoffReportDto } from './dto/payoff-response.dto';

@Controller('options')
export class OptionsController {
  constructor(private readonly optionsService: OptionsService) {}

  /**
   * Payoff curve, cost, premium and break-evens for a strategy.
   *
   * POST /options/payoff
   * @returns 503 when a leg has no quote and market data is enabled
   */
  @Post('payoff')
  @HttpCode(HttpStatus.OK)
  payoff(@Body() dto: BuildStrategyDto): Promise<PayoffReportDto> {
    return this.optionsService.payoffReport(dto);
  }

  /**
   * Option symbols for every expiration/strike/type combination.
   *
   * POST /options/symbols
   */
  @Post('symbols')
  @HttpCode(HttpStatus.OK)
  generateSymbols(@Body() dto: GenerateSymbolsDto) {
    const symbols = this.optionsService.generateSymbols(dto);
    return { count: symbols.length, symbols };
  }

  /**
   * Splits a symbol into underlying, expiration, type and strike.
   *
   * GET /options/symbols/F160617C00150000
   */
  @Get('symbols/:symbol')
  @HttpCode(HttpStatus.OK)
  decodeSymbol(@Param('symbol') symbol: string): DecodedSymbolDto {
    return this.optionsService.decodeSymbol(symbol);
  }

  /**
   * Serializes filter expressions for an option chain search.
   *
   * POST /options/query
   */
  @Post('query')
  @HttpCode(HttpStatus.OK)
  buildQuery(@Body() dto: OptionQueryDto) {
    return { query: this.optionsService.buildQuery(dto) };
  }
}
