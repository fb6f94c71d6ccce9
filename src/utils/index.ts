export { default as logger, Logging } from './logger';
export { AppError } from './AppError';
export type { ErrorCode } from './AppError';
export {
  parseCalendarDate,
  compareCalendarDates,
  addDays,
  enumerateDays,
  dayOfWeek,
  monthName,
  MONTH_NAMES,
  weekOfMonth,
} from './dates';
export type { CalendarDate } from './dates';
