export const METRIC_PATHS = {
  // Credentials
  CREDENTIALS_ISSUED_TOTAL: 'credentials.issued_total',
  CREDENTIALS_STORED_TOTAL: 'credentials.stored_total',
  CREDENTIALS_RETRIEVED_TOTAL: 'credentials.retrieved_total',
  CREDENTIALS_CONFLICTS_TOTAL: 'credentials.conflicts_total',

  // Status lists
  STATUS_ALLOCATED_TOTAL: 'status.allocated_total',
  STATUS_UPDATED_TOTAL: 'status.updated_total',
  STATUS_SHARDS_TOTAL: 'status.shards_total',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
