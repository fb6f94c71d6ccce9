/**
 * Row validation for the two input tables.
 *
 * The ingestion collaborator hands over rows that are already split into
 * cells; this module checks them and turns them into typed records. A bad
 * row never throws: it comes back as a failed RowParseResult carrying the row
 * number and a readable reason, so one unparsable date cannot take down a
 * whole batch.
 */

import { z } from 'zod';
import { parseCalendarDate } from '../utils/dates';
import type {
  OrderRecord,
  RawRow,
  RowParseResult,
  ScorecardRecord,
  TemplateFieldValue,
} from './types';

// ============================================
// Column handling
// ============================================

export const ORDER_COLUMNS = ['entity_name', 'order_date', 'status', 'source'] as const;
export const SCORECARD_COLUMNS = ['display_name', 'period_start', 'period_end'] as const;
const SCORECARD_COLUMN_SET: ReadonlySet<string> = new Set(SCORECARD_COLUMNS);

/**
 * Lowercases and trims column names and turns inner spaces into underscores,
 * so "Display Name" and "display_name" address the same column.
 */
export function normalizeRowKeys(row: RawRow): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key.trim().toLowerCase().replace(/\s+/g, '_')] = value;
  }
  return normalized;
}

// ============================================
// Schemas
// ============================================

const calendarDate = (column: string) =>
  z.unknown().transform((value, ctx) => {
    const parsed = parseCalendarDate(value);
    if (parsed === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${column}: "${String(value ?? '')}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

const orderRowSchema = z.object({
  entity_name: z
    .string({
      required_error: 'Missing entity_name',
      invalid_type_error: 'entity_name must be text',
    })
    .trim()
    .min(1, 'Missing or empty entity_name'),
  order_date: calendarDate('order_date'),
  status: z
    .string({ required_error: 'Missing status', invalid_type_error: 'status must be text' })
    .trim()
    .min(1, 'Missing or empty status')
    .transform((status) => status.toLowerCase()),
  source: optionalText,
});

const scorecardRowSchema = z.object({
  display_name: optionalText,
  period_start: calendarDate('period_start'),
  period_end: calendarDate('period_end'),
});

// ============================================
// Helpers
// ============================================

function describeIssues(error: z.ZodError): string {
  return error.errors.map((issue) => issue.message).join('; ');
}

function rawName(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Converts a template cell to a storable value. Spreadsheet booleans often
 * arrive as "TRUE"/"FALSE" text and are folded to real booleans.
 */
export function toTemplateFieldValue(value: unknown): TemplateFieldValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean' || typeof value === 'number') return value;
  if (value instanceof Date) return parseCalendarDate(value);

  const text = String(value).trim();
  const lowered = text.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return text;
}

// ============================================
// Row parsers
// ============================================

/**
 * Validates one order row.
 *
 * @example
 * parseOrderRow({ entity_name: 'John Smith', order_date: '2024-01-02', status: 'Completed', source: 'web' }, 1)
 * // { success: true, rowNumber: 1, data: { entityName: 'John Smith', orderDate: '2024-01-02', status: 'completed', source: 'web' } }
 */
export function parseOrderRow(row: RawRow, rowNumber: number): RowParseResult<OrderRecord> {
  const normalized = normalizeRowKeys(row);
  const parsed = orderRowSchema.safeParse(normalized);

  if (!parsed.success) {
    return {
      success: false,
      error: describeIssues(parsed.error),
      rowNumber,
      entityName: rawName(normalized.entity_name),
    };
  }

  return {
    success: true,
    data: {
      entityName: parsed.data.entity_name,
      orderDate: parsed.data.order_date,
      status: parsed.data.status,
      source: parsed.data.source,
    },
    rowNumber,
  };
}

/**
 * Validates one scorecard row. Columns other than the name and period are
 * kept as template fields. An empty display name is allowed here; the linker
 * reports it as unmatched.
 */
export function parseScorecardRow(
  row: RawRow,
  rowNumber: number
): RowParseResult<ScorecardRecord> {
  const normalized = normalizeRowKeys(row);
  const parsed = scorecardRowSchema.safeParse(normalized);

  if (!parsed.success) {
    return {
      success: false,
      error: describeIssues(parsed.error),
      rowNumber,
      entityName: rawName(normalized.display_name),
    };
  }

  const { display_name: displayName, period_start: periodStart, period_end: periodEnd } =
    parsed.data;

  if (periodStart > periodEnd) {
    return {
      success: false,
      error: `period_start ${periodStart} is after period_end ${periodEnd}`,
      rowNumber,
      entityName: rawName(normalized.display_name),
    };
  }

  const templateFields: Record<string, TemplateFieldValue> = {};
  for (const [key, value] of Object.entries(normalized)) {
    if (SCORECARD_COLUMN_SET.has(key)) continue;
    templateFields[key] = toTemplateFieldValue(value);
  }

  return {
    success: true,
    data: {
      displayName,
      periodStart,
      periodEnd,
      templateFields,
    },
    rowNumber,
  };
}
