import {
  IsString,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  Matches,
} from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/calendar-date';

export class ConsumeStockDto {
  @IsString()
  @IsNotEmpty()
  ingredientId!: string;

  @IsNumber()
  @IsPositive()
  quantity!: number;

  @IsOptional()
  @Matches(CALENDAR_DATE_PATTERN)
  today?: string; // defaults to the last processed day
}
