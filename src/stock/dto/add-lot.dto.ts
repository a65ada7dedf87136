import {
  IsString,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/calendar-date';

export class AddLotDto {
  @IsString()
  @IsNotEmpty()
  ingredientId!: string;

  @IsNumber()
  @Min(0)
  quantity!: number;

  @IsNumber()
  @Min(0)
  unitCostHt!: number; // pre-tax cost per unit

  @Matches(CALENDAR_DATE_PATTERN)
  purchaseDate!: string;

  @Matches(CALENDAR_DATE_PATTERN)
  expiryDate!: string;

  @IsString()
  @IsNotEmpty()
  supplierId!: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  qualityDegradationRate?: number; // share of the remaining quantity lost each day

  @IsOptional()
  @IsString()
  variantId?: string;

  @IsOptional()
  @IsString()
  lotNumber?: string;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN)
  today?: string; // date the returned status is evaluated at
}
