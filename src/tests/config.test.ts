import { resolve } from "node:path";
import { describe, expect, test } from "vitest";

import { buildSettings } from "../core/config";

describe("buildSettings", () => {
  test("falls back to defaults for an empty environment", () => {
    const built = buildSettings({});
    expect(built.appName).toBe("stock-forecast-api");
    expect(built.appEnv).toBe("dev");
    expect(built.appPort).toBe(8080);
    expect(built.corsOrigins).toEqual(["http://localhost:5173"]);
    expect(built.historyDataDir).toBe(resolve("./data"));
    expect(built.database).toEqual({
      url: "",
      host: "localhost",
      port: 5432,
      user: "postgres",
      password: "",
      name: "postgres",
      sslMode: "disable",
      poolMax: 10,
      connectionTimeoutMs: 5_000,
      statementTimeoutMs: 10_000
    });
  });

  test("reads overrides from the environment", () => {
    const built = buildSettings({
      APP_ENV: "PROD",
      APP_PORT: "9090",
      CORS_ORIGINS: "https://app.example.com, http://localhost:5173",
      HISTORY_DATA_DIR: "/srv/history",
      DB_SSLMODE: "require",
      DB_POOL_MAX: "4"
    });
    expect(built.appEnv).toBe("prod");
    expect(built.appPort).toBe(9090);
    expect(built.corsOrigins).toEqual(["https://app.example.com", "http://localhost:5173"]);
    expect(built.historyDataDir).toBe("/srv/history");
    expect(built.database.sslMode).toBe("require");
    expect(built.database.poolMax).toBe(4);
  });

  test("ignores unparsable values", () => {
    const built = buildSettings({
      APP_PORT: "eighty",
      DB_PORT: "",
      DB_SSLMODE: "sometimes",
      CORS_ORIGINS: " , "
    });
    expect(built.appPort).toBe(8080);
    expect(built.database.port).toBe(5432);
    expect(built.database.sslMode).toBe("disable");
    expect(built.corsOrigins).toEqual(["http://localhost:5173"]);
  });
});
