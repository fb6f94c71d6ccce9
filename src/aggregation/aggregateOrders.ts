/**
 * Order Aggregation for Scorecards
 *
 * Turns the orders linked to one entity into per-day counts by status for
 * the scorecard's reporting period. Orders from the excluded source never
 * count.
 */

import { enumerateDays, type CalendarDate } from '../utils/dates';
import type { OrderRecord } from '../records/types';
import type { DailyBucket } from './types';

const foldSource = (source: string): string => source.trim().toLowerCase();

/**
 * True when the order falls inside [periodStart, periodEnd] and does not come
 * from the excluded source (compared case-insensitively).
 */
export function isQualifyingOrder(
  order: OrderRecord,
  periodStart: CalendarDate,
  periodEnd: CalendarDate,
  excludedSource: string
): boolean {
  if (order.orderDate < periodStart || order.orderDate > periodEnd) {
    return false;
  }
  return foldSource(order.source) !== foldSource(excludedSource);
}

/**
 * Number of orders that aggregation keeps. Equals the sum of `total` over
 * the buckets returned by aggregateOrders for the same arguments.
 */
export function countOrdersInPeriod(
  orders: readonly OrderRecord[],
  periodStart: CalendarDate,
  periodEnd: CalendarDate,
  excludedSource: string
): number {
  return orders.filter((order) =>
    isQualifyingOrder(order, periodStart, periodEnd, excludedSource)
  ).length;
}

/**
 * Buckets an entity's orders by day and status.
 *
 * Only days with at least one qualifying order get a bucket; use
 * fillCalendar for a dense day-by-day series. Buckets are sorted by date.
 *
 * @example
 * aggregateOrders(orders, '2024-01-01', '2024-01-07', 'biteme')
 * // [{ date: '2024-01-02', countByStatus: { completed: 3 }, total: 3 },
 * //  { date: '2024-01-03', countByStatus: { completed: 1 }, total: 1 }]
 */
export function aggregateOrders(
  entityOrders: readonly OrderRecord[],
  periodStart: CalendarDate,
  periodEnd: CalendarDate,
  excludedSource: string
): DailyBucket[] {
  const byDate = new Map<CalendarDate, Map<string, number>>();

  for (const order of entityOrders) {
    if (!isQualifyingOrder(order, periodStart, periodEnd, excludedSource)) continue;

    let statuses = byDate.get(order.orderDate);
    if (!statuses) {
      statuses = new Map();
      byDate.set(order.orderDate, statuses);
    }
    statuses.set(order.status, (statuses.get(order.status) ?? 0) + 1);
  }

  return [...byDate.keys()].sort().map((date) => {
    const statuses = byDate.get(date) ?? new Map<string, number>();
    const countByStatus: Record<string, number> = {};
    let total = 0;
    for (const status of [...statuses.keys()].sort()) {
      const count = statuses.get(status) ?? 0;
      countByStatus[status] = count;
      total += count;
    }
    return { date, countByStatus, total };
  });
}

/**
 * Expands sparse buckets into one bucket per day of the period; missing
 * days get an empty bucket. Buckets outside the period are dropped.
 */
export function fillCalendar(
  buckets: readonly DailyBucket[],
  periodStart: CalendarDate,
  periodEnd: CalendarDate
): DailyBucket[] {
  const byDate = new Map(buckets.map((bucket) => [bucket.date, bucket]));
  return enumerateDays(periodStart, periodEnd).map(
    (date) => byDate.get(date) ?? { date, countByStatus: {}, total: 0 }
  );
}

export default aggregateOrders;
