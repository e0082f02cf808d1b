import { IsBoolean, IsEnum, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Min, ValidateIf } from 'class-validator';
import { Direction } from '../entities/option-components.entity';
import { StrategyKind } from '../strategies';

const needsBothStrikes = (dto: BuildStrategyDto) =>
  dto.strategy === StrategyKind.STRANGLE || dto.strategy === StrategyKind.COLLAR;

// Request for a strategy payoff report.
// `symbol` is a full option symbol, or the bare underlying when
// expiration and strikes are all given.
export class BuildStrategyDto {
  @IsEnum(StrategyKind)
  strategy!: StrategyKind;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsOptional()
  @IsEnum(Direction)
  direction?: Direction;           // ignored by collar

  @IsOptional()
  @IsString()
  expiration?: string;             // YYYY-MM-DD or YYYYMMDD

  @IsOptional()
  @IsNumber()
  @Min(0)
  strike?: number;                 // call, put, straddle; rejected otherwise

  @ValidateIf(needsBothStrikes)
  @IsNumber()
  @Min(0)
  callStrike?: number;             // strangle, collar

  @ValidateIf(needsBothStrikes)
  @IsNumber()
  @Min(0)
  putStrike?: number;              // strangle, collar

  @IsOptional()
  @IsPositive()
  priceRange?: number;

  @IsOptional()
  @IsPositive()
  tickSize?: number;

  @IsOptional()
  @IsBoolean()
  includeCost?: boolean;

  @IsOptional()
  @IsBoolean()
  includePremium?: boolean;
}
