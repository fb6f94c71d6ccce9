export {
  aggregateOrders,
  fillCalendar,
  countOrdersInPeriod,
  isQualifyingOrder,
} from './aggregateOrders';
export type { DailyBucket } from './types';
