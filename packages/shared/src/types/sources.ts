/**
 * Collaborator interfaces: the public contract between the collection
 * engine and the outside world.
 *
 * IMPORTANT: These must stay independent of any SDK. The engine only ever
 * sees these interfaces; the AWS-backed implementations live in the
 * collector's `aws/` module and tests substitute in-process fakes.
 */

import type { MetricQuery, MetricStatistics } from "./metrics.js";

/** Remote, rate-limited statistics API */
export interface MetricSource {
  /**
   * Fetch aggregated datapoints for one (table, operation, metric, window).
   * Failures surface as MetricSourceError (transient or permanent).
   */
  getStatistics(query: MetricQuery): Promise<MetricStatistics>;
}

/** Table metadata as far as the engine cares */
export interface TableDescription {
  tableName: string;
  creationTime: Date;
  status?: string;
  itemCount?: number;
  sizeBytes?: number;
}

export interface TableCatalog {
  /** List every table name in the catalog's region */
  listTables(): Promise<string[]>;

  /** Describe a single table */
  describe(table: string): Promise<TableDescription>;
}
