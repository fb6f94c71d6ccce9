/**
 * Record types shared by every stage of the scorecard pipeline.
 */

import type { CalendarDate } from '../utils/dates';

/**
 * Known order statuses. Any other lowercased status from the export is kept
 * as-is and charted with the fallback color.
 */
export type KnownOrderStatus = 'pending' | 'completed' | 'cancelled';
export type OrderStatus = KnownOrderStatus | (string & {});

/**
 * One order line from the order export. Immutable once ingested.
 */
export interface OrderRecord {
  readonly entityName: string;
  readonly orderDate: CalendarDate;
  readonly status: OrderStatus;
  readonly source: string;
}

export type TemplateFieldValue = string | number | boolean | null;

/**
 * One row of the scorecard template sheet; one scene is composed per record.
 */
export interface ScorecardRecord {
  readonly displayName: string;
  readonly periodStart: CalendarDate;
  readonly periodEnd: CalendarDate;
  readonly templateFields: Readonly<Record<string, TemplateFieldValue>>;
}

/**
 * A row as handed over by the ingestion collaborator: column name -> cell.
 */
export type RawRow = Readonly<Record<string, unknown>>;

export type RowParseResult<T> =
  | { success: true; data: T; rowNumber: number }
  | {
      success: false;
      error: string;
      rowNumber: number;
      /** Raw entity/display name when the row had one, for flagging */
      entityName?: string;
    };

/**
 * An order row that failed validation, kept so it can be reported against
 * the scorecard its entity links to.
 */
export interface MalformedOrderRow {
  rowNumber: number;
  entityName: string;
  error: string;
}
