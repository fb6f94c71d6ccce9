import type { CalendarDate } from '../utils/dates';

/**
 * Orders of one entity on one day, split by status.
 */
export interface DailyBucket {
  date: CalendarDate;
  /** Lowercased status -> order count; keys in alphabetical order */
  countByStatus: Readonly<Record<string, number>>;
  /** Sum of countByStatus */
  total: number;
}
