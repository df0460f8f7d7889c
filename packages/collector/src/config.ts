/**
 * Collector configuration: command-line flags, then environment variables,
 * then schema defaults.
 *
 * The schema doubles as the static `CollectorConfig` type via `Static<>`.
 * Every violation is collected into a single ConfigurationError.
 */

import { parseArgs } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** e.g. us-east-1, eu-central-2, us-gov-west-1 */
const RegionPattern = "^[a-z]{2}(-[a-z]+)+-\\d$";

const Horizon = Type.Union([Type.Literal("3hr"), Type.Literal("7day")]);

const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export const CollectorConfigSchema = Type.Object({
  /** Empty means "resolve the default region" */
  regions: Type.Array(Type.String({ pattern: RegionPattern }), { uniqueItems: true, default: [] }),
  tables: Type.Array(Type.String({ minLength: 3, maxLength: 255 }), { uniqueItems: true, default: [] }),
  tablePrefix: Type.Optional(Type.String({ minLength: 1 })),
  tableSuffix: Type.Optional(Type.String({ minLength: 1 })),
  matchBoth: Type.Boolean({ default: false }),
  waitThreshold: Type.Integer({ minimum: 1, default: 1000 }),
  maxParallel: Type.Integer({ minimum: 1, maximum: 64, default: 8 }),
  horizons: Type.Array(Horizon, { minItems: 1, uniqueItems: true, default: ["3hr", "7day"] }),
  outputDir: Type.String({ minLength: 1, default: "." }),
  /** Explicit run root; resumes into an existing directory */
  runRoot: Type.Optional(Type.String({ minLength: 1 })),
  profile: Type.Optional(Type.String({ minLength: 1 })),
  instanceProfile: Type.Boolean({ default: false }),
  maxAttempts: Type.Integer({ minimum: 1, maximum: 10, default: 3 }),
  logLevel: Type.Union(LogLevel.anyOf, { default: "info" }),
});

export type CollectorConfig = Static<typeof CollectorConfigSchema>;

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export type Command = "collect" | "consolidate";

export interface CommandLine {
  command: Command;
  help: boolean;
  config: CollectorConfig;
}

export const USAGE = `Usage:
  ddb-metrics [collect] [options]
  ddb-metrics consolidate <run-root> [--horizons 3hr,7day]

Options:
  -r, --regions <list>        Regions to scan (comma-separated; default: profile region)
  -t, --tables <list>         Only these tables (comma-separated)
      --prefix <str>          Only tables starting with <str>
      --suffix <str>          Only tables ending with <str>
      --both                  Require prefix AND suffix
  -w, --wait-threshold <n>    API calls between drain barriers (default: 1000)
      --max-parallel <n>      Concurrent API calls (default: 8)
      --horizons <list>       Horizons to collect: 3hr,7day (default: both)
  -o, --output <dir>          Parent directory for the run root (default: .)
      --run-root <dir>        Write into this run root instead of a new one
  -p, --profile <name>        AWS profile
  -I, --instance-profile      Use EC2 instance profile credentials
      --max-attempts <n>      SDK attempts per API call (default: 3)
      --log-level <level>     fatal|error|warn|info|debug|trace|silent (default: info)
  -h, --help                  Show this help
`;

const OPTIONS = {
  regions: { type: "string", short: "r", multiple: true },
  tables: { type: "string", short: "t", multiple: true },
  prefix: { type: "string" },
  suffix: { type: "string" },
  both: { type: "boolean" },
  "wait-threshold": { type: "string", short: "w" },
  "max-parallel": { type: "string" },
  horizons: { type: "string" },
  output: { type: "string", short: "o" },
  "run-root": { type: "string" },
  profile: { type: "string", short: "p" },
  "instance-profile": { type: "boolean", short: "I" },
  "max-attempts": { type: "string" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

/** Split comma-separated values; undefined when nothing was given */
function list(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = (Array.isArray(value) ? value : [value])
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  return items.length > 0 ? items : undefined;
}

/** Flag spellings (`--suffix`, `-p`) that take a value, mapped to the long name */
const VALUE_FLAGS = new Map<string, string>();
for (const [name, option] of Object.entries(OPTIONS)) {
  if (option.type !== "string") continue;
  VALUE_FLAGS.set(`--${name}`, name);
  if ("short" in option) VALUE_FLAGS.set(`-${option.short}`, name);
}

/**
 * Rewrite `--suffix -v2` as `--suffix=-v2`. parseArgs refuses a separate
 * value that starts with a dash, and table suffixes often do.
 */
function joinFlagValues(argv: string[]): string[] {
  const joined: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      joined.push(...argv.slice(i));
      break;
    }
    const name = VALUE_FLAGS.get(arg);
    if (name !== undefined && i + 1 < argv.length) {
      i++;
      joined.push(`--${name}=${argv[i]}`);
    } else {
      joined.push(arg);
    }
  }
  return joined;
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: joinFlagValues(argv),
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new ConfigurationError("Invalid command line", [errorMessage(err)], { cause: err });
  }
}

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

export function loadConfig(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): CommandLine {
  const { values, positionals } = parseCommandLine(argv);

  const [first, ...rest] = positionals;
  let command: Command = "collect";
  if (first === "consolidate" || first === "collect") {
    command = first;
  } else if (first !== undefined) {
    throw new ConfigurationError(`Unknown command "${first}"`);
  }

  let runRoot = values["run-root"];
  if (command === "consolidate") {
    if (rest.length !== 1) {
      throw new ConfigurationError("consolidate takes exactly one <run-root> argument");
    }
    runRoot = rest[0];
  } else if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected argument "${rest[0]}"`);
  }

  // Flags win over environment; absent keys fall through to schema defaults
  const candidates: Record<string, unknown> = {
    regions: list(values.regions) ?? list(env.DDB_METRICS_REGIONS),
    tables: list(values.tables) ?? list(env.DDB_METRICS_TABLES),
    tablePrefix: values.prefix ?? env.DDB_METRICS_TABLE_PREFIX,
    tableSuffix: values.suffix ?? env.DDB_METRICS_TABLE_SUFFIX,
    matchBoth: values.both,
    waitThreshold: values["wait-threshold"] ?? env.DDB_METRICS_WAIT_THRESHOLD,
    maxParallel: values["max-parallel"] ?? env.DDB_METRICS_MAX_PARALLEL,
    horizons: list(values.horizons) ?? list(env.DDB_METRICS_HORIZONS),
    outputDir: values.output ?? env.DDB_METRICS_OUTPUT_DIR,
    runRoot,
    profile: values.profile ?? env.AWS_PROFILE,
    instanceProfile: values["instance-profile"],
    maxAttempts: values["max-attempts"] ?? env.DDB_METRICS_MAX_ATTEMPTS,
    logLevel: values["log-level"] ?? env.LOG_LEVEL,
  };
  const raw = Object.fromEntries(
    Object.entries(candidates).filter(([, value]) => value !== undefined && value !== ""),
  );

  const config = Value.Convert(CollectorConfigSchema, Value.Default(CollectorConfigSchema, raw));
  if (!Value.Check(CollectorConfigSchema, config)) {
    const details = [...Value.Errors(CollectorConfigSchema, config)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigurationError("Invalid configuration", details);
  }

  const conflicts: string[] = [];
  if (config.matchBoth && !(config.tablePrefix && config.tableSuffix)) {
    conflicts.push("--both requires both --prefix and --suffix");
  }
  if (config.instanceProfile && config.profile && values.profile !== undefined) {
    conflicts.push("--instance-profile cannot be combined with --profile");
  }
  if (conflicts.length > 0) {
    throw new ConfigurationError("Invalid configuration", conflicts);
  }

  return { command, help: values.help ?? false, config };
}
