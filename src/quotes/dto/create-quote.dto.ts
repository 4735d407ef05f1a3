import {
  ArrayMinSize,
  IsArray,
  IsDefined,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { MAX_MONEY_AMOUNT } from '../../common/money/money';
import { SUPPORTED_LANGS, type SupportedLang } from '../quote.types';

const FINITE = { allowNaN: false, allowInfinity: false };

export class ClientDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  /** Usually an email address; shown in the draft as given. */
  @IsString()
  @IsNotEmpty()
  contact!: string;

  @IsIn(SUPPORTED_LANGS)
  lang!: SupportedLang;
}

export class QuoteItemDto {
  @IsString()
  @IsNotEmpty()
  sku!: string;

  @IsInt()
  @Min(1)
  @Max(Number.MAX_SAFE_INTEGER)
  qty!: number;

  @IsNumber(FINITE)
  @Min(0)
  @Max(MAX_MONEY_AMOUNT)
  unit_cost!: number;

  /**
   * Markup over unit cost in percent. No upper bound of its own; the priced
   * amounts are range-checked instead.
   */
  @IsNumber(FINITE)
  @Min(0)
  margin_pct!: number;
}

export class CreateQuoteDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => ClientDto)
  client!: ClientDto;

  @IsString()
  @IsNotEmpty()
  currency!: string;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => QuoteItemDto)
  items!: QuoteItemDto[];

  @IsOptional()
  @IsString()
  delivery_terms?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
