import { Matches } from 'class-validator';
import { CALENDAR_DATE_PATTERN } from '../../common/utils/calendar-date';

export class ProcessDayDto {
  @Matches(CALENDAR_DATE_PATTERN)
  today!: string;
}
