export {
  parseOrderRow,
  parseScorecardRow,
  normalizeRowKeys,
  toTemplateFieldValue,
  ORDER_COLUMNS,
  SCORECARD_COLUMNS,
} from './parseRecords';

export type {
  OrderRecord,
  OrderStatus,
  KnownOrderStatus,
  ScorecardRecord,
  TemplateFieldValue,
  RawRow,
  RowParseResult,
  MalformedOrderRow,
} from './types';
