import { describe, it, expect } from "vitest";
import { describeFilter, filterTables, matchesFilter } from "./table-filter.js";

const NAMES = ["prod-orders", "prod-users-v2", "dev-orders", "orders-v2", "audit"];

describe("matchesFilter", () => {
  it("passes everything without filters", () => {
    expect(filterTables(NAMES, {})).toEqual([
      "audit",
      "dev-orders",
      "orders-v2",
      "prod-orders",
      "prod-users-v2",
    ]);
  });

  it("restricts to explicit names", () => {
    expect(filterTables(NAMES, { tables: ["audit", "missing"] })).toEqual(["audit"]);
  });

  it("applies prefix and suffix independently", () => {
    expect(filterTables(NAMES, { prefix: "prod-" })).toEqual(["prod-orders", "prod-users-v2"]);
    expect(filterTables(NAMES, { suffix: "-v2" })).toEqual(["orders-v2", "prod-users-v2"]);
    expect(filterTables(NAMES, { prefix: "prod-", suffix: "-v2" })).toEqual(["prod-users-v2"]);
  });

  it("requires both ends when matchBoth is set", () => {
    expect(filterTables(NAMES, { prefix: "prod-", suffix: "-v2", matchBoth: true })).toEqual([
      "prod-users-v2",
    ]);
  });

  it("matches nothing when matchBoth is set with only one end", () => {
    expect(filterTables(NAMES, { prefix: "prod-", matchBoth: true })).toEqual([]);
    expect(filterTables(NAMES, { suffix: "-v2", matchBoth: true })).toEqual([]);
    expect(matchesFilter("prod-users-v2", { matchBoth: true })).toBe(false);
  });

  it("combines explicit names with prefix", () => {
    expect(filterTables(NAMES, { tables: ["dev-orders", "prod-orders"], prefix: "prod-" })).toEqual([
      "prod-orders",
    ]);
  });
});

describe("describeFilter", () => {
  it("summarises the active filters", () => {
    expect(describeFilter({})).toBe("all tables");
    expect(describeFilter({ prefix: "prod-", suffix: "-v2", matchBoth: true })).toBe(
      "prefix=prod- suffix=-v2 both",
    );
  });
});
