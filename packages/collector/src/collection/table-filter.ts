/**
 * Table selection: explicit names, prefix and suffix filters.
 */

export interface TableFilter {
  /** Exact table names; empty or absent means every table */
  tables?: string[];
  prefix?: string;
  suffix?: string;
  /**
   * Match only on prefix AND suffix together. Prefix and suffix are always
   * combined with AND; this additionally matches nothing unless both are set.
   */
  matchBoth?: boolean;
}

export function matchesFilter(name: string, filter: TableFilter): boolean {
  if (filter.tables && filter.tables.length > 0 && !filter.tables.includes(name)) {
    return false;
  }

  if (filter.matchBoth && !(filter.prefix && filter.suffix)) return false;

  const prefixOk = !filter.prefix || name.startsWith(filter.prefix);
  const suffixOk = !filter.suffix || name.endsWith(filter.suffix);

  return prefixOk && suffixOk;
}

/** Names passing the filter, sorted */
export function filterTables(names: string[], filter: TableFilter): string[] {
  return names.filter((name) => matchesFilter(name, filter)).sort();
}

/** One-line description for logs */
export function describeFilter(filter: TableFilter): string {
  const parts: string[] = [];
  if (filter.tables && filter.tables.length > 0) parts.push(`tables=${filter.tables.join(",")}`);
  if (filter.prefix) parts.push(`prefix=${filter.prefix}`);
  if (filter.suffix) parts.push(`suffix=${filter.suffix}`);
  if (filter.matchBoth) parts.push("both");
  return parts.length > 0 ? parts.join(" ") : "all tables";
}
