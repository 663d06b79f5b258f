import { inspect } from "node:util";

const LEVELS = ["debug", "info", "warn", "error"] as const;
type LogLevel = (typeof LEVELS)[number];
type LogFormat = "pretty" | "json";

const isLevel = (value: string): value is LogLevel =>
  LEVELS.some((level) => level === value);

const parseLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  return isLevel(normalized) ? normalized : "info";
};

const parseFormat = (value: string | undefined): LogFormat => {
  const normalized = String(value ?? "").toLowerCase();
  if (normalized === "json") return "json";
  if (normalized === "pretty") return "pretty";
  return process.env.APP_ENV === "prod" ? "json" : "pretty";
};

const shouldLog = (messageLevel: LogLevel, configured: LogLevel): boolean =>
  LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(configured);

const configuredLevel = parseLevel(process.env.LOG_LEVEL);
const configuredFormat = parseFormat(process.env.LOG_FORMAT);
const appName = process.env.APP_NAME ?? "stock-forecast-api";

const supportColor =
  Boolean(process.stdout.isTTY) &&
  process.env.NO_COLOR === undefined &&
  process.env.TERM !== "dumb";

const levelColor: Record<LogLevel, number> = {
  debug: 90,
  info: 36,
  warn: 33,
  error: 31
};

const colorize = (text: string, colorCode: number): string =>
  supportColor ? `\u001b[${colorCode}m${text}\u001b[0m` : text;

const stamp = (): string => new Date().toISOString();

const toJsonSafe = (value: unknown, seen = new WeakSet<object>()): unknown => {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: toJsonSafe(value.cause, seen)
    };
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (!value || typeof value !== "object") return value;
  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => toJsonSafe(item, seen));
  }

  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = toJsonSafe(item, seen);
  }
  return out;
};

const inspectMeta = (value: unknown): string =>
  inspect(value, {
    colors: supportColor,
    depth: 6,
    compact: false,
    breakLength: 110,
    maxArrayLength: 20
  });

const splitMessageAndMeta = (args: unknown[]): { message: string; meta: unknown[] } => {
  if (args.length === 0) return { message: "", meta: [] };
  if (typeof args[0] === "string") {
    return { message: args[0], meta: args.slice(1) };
  }
  return { message: "log", meta: args };
};

const sinkFor = (level: LogLevel): NodeJS.WriteStream =>
  level === "warn" || level === "error" ? process.stderr : process.stdout;

const writePretty = (level: LogLevel, scope: string | undefined, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const levelLabel = colorize(level.toUpperCase().padEnd(5), levelColor[level]);
  const label = scope ? `${appName}:${scope}` : appName;
  const header = `${stamp()} ${levelLabel} [${label}] ${message}`;
  const sink = sinkFor(level);
  if (meta.length === 0) {
    sink.write(`${header}\n`);
    return;
  }

  const lines = meta.map((entry, index) => {
    const branch = index === meta.length - 1 ? "└─" : "├─";
    return `  ${branch} ${inspectMeta(entry)}`;
  });
  sink.write(`${header}\n${lines.join("\n")}\n`);
};

const writeJson = (level: LogLevel, scope: string | undefined, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const payload = {
    timestamp: stamp(),
    level,
    app: appName,
    scope,
    message,
    meta: meta.length > 0 ? toJsonSafe(meta) : undefined
  };
  sinkFor(level).write(`${JSON.stringify(payload)}\n`);
};

const writeLog = (level: LogLevel, scope: string | undefined, args: unknown[]): void => {
  if (!shouldLog(level, configuredLevel)) return;
  if (configuredFormat === "json") writeJson(level, scope, args);
  else writePretty(level, scope, args);
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** Logger whose lines are tagged `[app:scope]`, e.g. `createLogger("history")`. */
export const createLogger = (scope?: string): Logger => ({
  debug: (...args: unknown[]) => writeLog("debug", scope, args),
  info: (...args: unknown[]) => writeLog("info", scope, args),
  warn: (...args: unknown[]) => writeLog("warn", scope, args),
  error: (...args: unknown[]) => writeLog("error", scope, args)
});

export const logger = createLogger();
