import { Transform, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { SUPPORTED_CURRENCIES } from '../currency-rates';

// Argument shapes for each tool. Used by POST /tools/:name and by the
// hosted runtime when the model requests a function call.

export class StockPriceArgsDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;
}

// Models often send null for an optional argument; treat it as absent.
export class MarketNewsArgsDto {
  @Transform(({ value }) => value ?? 'stocks')
  @IsOptional()
  @IsString()
  category: string = 'stocks';

  @Transform(({ value }) => value ?? 5)
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(20)
  limit: number = 5;
}

export class PortfolioHoldingDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber()
  @IsPositive()
  shares!: number;

  @IsNumber()
  @IsPositive()
  averageCost!: number;
}

export class AnalyzePortfolioArgsDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => PortfolioHoldingDto)
  holdings!: PortfolioHoldingDto[];
}

export class CalculateReturnsArgsDto {
  @IsNumber()
  @IsPositive()
  initialInvestment!: number;

  @IsNumber()
  @Min(0)
  finalValue!: number;

  @IsNumber()
  @IsPositive()
  periodYears!: number;
}

export class PercentageReturnArgsDto {
  @IsNumber()
  @IsPositive()
  start!: number;

  @IsNumber()
  @Min(0)
  end!: number;
}

export class CurrencyConverterArgsDto {
  @IsNumber()
  @IsPositive()
  amount!: number;

  @IsString()
  @IsIn(SUPPORTED_CURRENCIES.flatMap((code) => [code, code.toLowerCase()]))
  fromCurrency!: string;

  @IsString()
  @IsIn(SUPPORTED_CURRENCIES.flatMap((code) => [code, code.toLowerCase()]))
  toCurrency!: string;
}

export class RiskAssessmentArgsDto {
  @IsNumber()
  @Min(0)
  beta!: number;

  @IsNumber()
  @Min(0)
  volatility!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  diversificationScore?: number;
}
