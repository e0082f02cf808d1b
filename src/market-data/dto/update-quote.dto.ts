import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsNumber, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

// Quote for a single option symbol
export class UpdateQuoteDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber()
  @Min(0)
  bid!: number;

  @IsNumber()
  @Min(0)
  ask!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  last?: number;
}

// Several quotes at once, applied all-or-nothing
export class BulkUpdateQuotesDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UpdateQuoteDto)
  quotes!: UpdateQuoteDto[];
}
