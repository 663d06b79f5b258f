import { resolve } from "node:path";

export type AppEnv = "dev" | "test" | "prod";
export type DbSslMode = "disable" | "require" | "verify-full";

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseCsv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
};

const parseAppEnv = (value: string | undefined): AppEnv => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "test" || normalized === "prod") return normalized;
  return "dev";
};

const parseSslMode = (value: string | undefined): DbSslMode => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "require" || normalized === "verify-full") return normalized;
  return "disable";
};

export const buildSettings = (env: NodeJS.ProcessEnv) => ({
  appName: env.APP_NAME ?? "stock-forecast-api",
  appEnv: parseAppEnv(env.APP_ENV),
  appHost: env.APP_HOST ?? "0.0.0.0",
  appPort: parseNumber(env.APP_PORT, 8080),
  corsOrigins: parseCsv(env.CORS_ORIGINS, ["http://localhost:5173"]),

  historyDataDir: resolve(env.HISTORY_DATA_DIR ?? "./data"),

  database: {
    url: env.DATABASE_URL ?? "",
    host: env.DB_HOST ?? "localhost",
    port: parseNumber(env.DB_PORT, 5432),
    user: env.DB_USER ?? "postgres",
    password: env.DB_PASSWORD ?? "",
    name: env.DB_NAME ?? "postgres",
    sslMode: parseSslMode(env.DB_SSLMODE),
    poolMax: parseNumber(env.DB_POOL_MAX, 10),
    connectionTimeoutMs: parseNumber(env.DB_CONNECTION_TIMEOUT_MS, 5_000),
    statementTimeoutMs: parseNumber(env.DB_STATEMENT_TIMEOUT_MS, 10_000)
  }
});

export type AppSettings = ReturnType<typeof buildSettings>;
export type DatabaseSettings = AppSettings["database"];

export const settings: AppSettings = buildSettings(process.env);
