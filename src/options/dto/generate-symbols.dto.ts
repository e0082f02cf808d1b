import { ArrayNotEmpty, IsArray, IsBoolean, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';

// Cartesian product of expirations x types x strikes
export class GenerateSymbolsDto {
  @IsString()
  @IsNotEmpty()
  underlying!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  expirations!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsNumber({}, { each: true })
  @Min(0, { each: true })
  strikes!: number[];

  @IsOptional()
  @IsBoolean()
  calls?: boolean;

  @IsOptional()
  @IsBoolean()
  puts?: boolean;
}
