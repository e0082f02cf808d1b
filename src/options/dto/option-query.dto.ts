import { IsArray, IsBoolean, IsOptional, IsString } from 'class-validator';

// Filter expressions such as "strikeprice > 100"
export class OptionQueryDto {
  @IsArray()
  @IsString({ each: true })
  expressions!: string[];

  @IsOptional()
  @IsBoolean()
  strict?: boolean;                // reject instead of dropping unknown filters
}
