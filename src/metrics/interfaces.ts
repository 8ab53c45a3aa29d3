/**
 * Snapshot of the service's in-process counters.
 */
export interface Metrics {
  credentials: {
    /** Credentials signed and returned to callers */
    issued_total: number;
    /** Credentials written to a vault */
    stored_total: number;
    /** Credentials read back from a vault */
    retrieved_total: number;
    /** Retrievals that found divergent duplicates */
    conflicts_total: number;
  };

  status: {
    /** Status list slots handed out */
    allocated_total: number;
    /** Status updates applied */
    updated_total: number;
    /** Status list shards created */
    shards_total: number;
  };

  server: {
    uptime_seconds: number;
  };
}
