import { Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/calendar-date';
import { WasteReason } from '../stock.types';

export class TodayQueryDto {
  @Matches(CALENDAR_DATE_PATTERN)
  today!: string;
}

export class LotsQueryDto extends TodayQueryDto {
  @IsOptional()
  @IsString()
  ingredientId?: string;
}

export class NearExpiryQueryDto extends TodayQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  days?: number;
}

export class OptionalTodayQueryDto {
  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN)
  today?: string;
}

export class PromotionPriceQueryDto {
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  basePrice!: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  discountRate?: number;
}

export class WasteQueryDto {
  @IsOptional()
  @IsString()
  ingredientId?: string;

  @IsOptional()
  @IsEnum(WasteReason)
  reason?: WasteReason;
}
