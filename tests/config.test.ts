import { describe, it, expect } from "vitest";
import { loadConfig, readSecret, ConfigError } from "../src/config/config.js";

const base = {
  PUNCHCLOCK_ACTIVE: "true",
  PUNCHCLOCK_IDENTIFIERS: '["11111111k","222222222"]',
  PUNCHCLOCK_EMAIL_ADDRESS: "primary@example.com",
  PUNCHCLOCK_EMAIL_PASSWORD: "test-secret",
  PUNCHCLOCK_PORTAL_URL: "https://portal.example.test/punch",
};

const b64 = (text: string) => Buffer.from(text, "utf-8").toString("base64");

function issuesFor(env: Record<string, string | undefined>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  it("applies defaults around the required settings", () => {
    const config = loadConfig(base);

    expect(config.active).toBe(true);
    expect(config.simulate).toBe(false);
    expect(config.identifiers).toEqual(["11111111k", "222222222"]);
    expect(config.exceptions).toEqual([]);
    expect(config.execution).toEqual({
      mode: "concurrent",
      maxWorkers: 2,
      retryAttempts: 3,
      retryDelaySeconds: 30,
      breakerThreshold: 3,
      breakerResetSeconds: 60,
      metrics: true,
    });
    expect(config.notifications).toEqual({
      primary: "primary@example.com",
      smtp: {
        host: "smtp.gmail.com",
        port: 587,
        user: "primary@example.com",
        password: "test-secret",
      },
    });
    expect(config.portal).toEqual({ url: "https://portal.example.test/punch", timeoutMs: 30_000 });
    expect(config.holidays).toEqual({ apiUrl: "https://api.boostr.cl/holidays.json", timeoutMs: 5_000 });
    expect(config.logging).toEqual({ level: "info", dir: "./logs", runNumber: "local" });
    expect(config.kafka).toBeUndefined();
    expect(config.timeZone).toBe("America/Santiago");
  });

  it("only treats the literal true as enabled", () => {
    expect(loadConfig({ ...base, PUNCHCLOCK_ACTIVE: "TRUE" }).active).toBe(true);
    expect(loadConfig({ ...base, PUNCHCLOCK_ACTIVE: "yes" }).active).toBe(false);
    expect(loadConfig({ ...base, PUNCHCLOCK_ACTIVE: undefined }).active).toBe(false);
  });

  it("prefers the base64 form of a secret", () => {
    const config = loadConfig({
      ...base,
      PUNCHCLOCK_IDENTIFIERS_B64: b64('["33333333k"]'),
      PUNCHCLOCK_EXCEPTIONS_B64: b64('["33333333K"]'),
    });

    expect(config.identifiers).toEqual(["33333333k"]);
    expect(config.exceptions).toEqual(["33333333K"]);
  });

  it("accepts numeric identifiers in the JSON list", () => {
    const config = loadConfig({ ...base, PUNCHCLOCK_IDENTIFIERS: '[11111111, "222222222"]' });
    expect(config.identifiers).toEqual(["11111111", "222222222"]);
  });

  it("does not require a password or portal in simulation mode", () => {
    const config = loadConfig({
      PUNCHCLOCK_SIMULATE: "true",
      PUNCHCLOCK_IDENTIFIERS: '["11111111k"]',
      PUNCHCLOCK_EMAIL_ADDRESS: "primary@example.com",
    });

    expect(config.simulate).toBe(true);
    expect(config.notifications.smtp.password).toBe("");
    expect(config.portal).toEqual({ timeoutMs: 30_000 });
  });

  it("binds the secondary address to its identifier", () => {
    const config = loadConfig({
      ...base,
      PUNCHCLOCK_SECONDARY_EMAIL: "second@example.com",
      PUNCHCLOCK_SECONDARY_IDENTIFIER_B64: b64("222222222"),
    });

    expect(config.notifications.secondary).toEqual({
      address: "second@example.com",
      identifier: "222222222",
    });
  });

  it("enables the event stream when brokers are listed", () => {
    const config = loadConfig({ ...base, PUNCHCLOCK_KAFKA_BROKERS: "kafka-1:9092, kafka-2:9092" });

    expect(config.kafka).toEqual({
      brokers: ["kafka-1:9092", "kafka-2:9092"],
      clientId: "punchclock",
      topicPrefix: "punchclock",
    });
  });

  it("reads execution overrides", () => {
    const config = loadConfig({
      ...base,
      PUNCHCLOCK_EXECUTION_MODE: "sequential",
      PUNCHCLOCK_MAX_WORKERS: "4",
      PUNCHCLOCK_RETRY_ATTEMPTS: "0",
      PUNCHCLOCK_RETRY_DELAY_SECONDS: "10",
      PUNCHCLOCK_METRICS: "false",
    });

    expect(config.execution).toMatchObject({
      mode: "sequential",
      maxWorkers: 4,
      retryAttempts: 0,
      retryDelaySeconds: 10,
      metrics: false,
    });
  });

  describe("rejects", () => {
    it("a missing identifier list", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_IDENTIFIERS: undefined })).toContain(
        "PUNCHCLOCK_IDENTIFIERS: is required",
      );
    });

    it("a list that is not JSON", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_IDENTIFIERS: "11111111k" })).toContain(
        "PUNCHCLOCK_IDENTIFIERS: must be a JSON array",
      );
    });

    it("malformed identifiers", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_IDENTIFIERS: '["11111111k","12.345.678-9"]' })).toContain(
        "PUNCHCLOCK_IDENTIFIERS: entry 2 is not a valid identifier",
      );
    });

    it("duplicate identifiers regardless of case", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_IDENTIFIERS: '["11111111k","11111111K"]' })).toContain(
        "PUNCHCLOCK_IDENTIFIERS: entry 2 is a duplicate",
      );
    });

    it("more than ten identifiers", () => {
      const eleven = Array.from({ length: 11 }, (_, i) => `${10_000_000 + i}k`);
      expect(issuesFor({ ...base, PUNCHCLOCK_IDENTIFIERS: JSON.stringify(eleven) })).toContain(
        "PUNCHCLOCK_IDENTIFIERS: must hold between 1 and 10 identifiers",
      );
    });

    it("out-of-range worker counts", () => {
      const issues = issuesFor({ ...base, PUNCHCLOCK_MAX_WORKERS: "11" });
      expect(issues).toHaveLength(1);
      expect(issues[0]?.startsWith("PUNCHCLOCK_MAX_WORKERS: ")).toBe(true);
    });

    it("a missing password outside simulation mode", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_EMAIL_PASSWORD: undefined })).toEqual([
        "PUNCHCLOCK_EMAIL_PASSWORD: is required outside simulation mode",
      ]);
    });

    it("a secondary address without its identifier", () => {
      expect(issuesFor({ ...base, PUNCHCLOCK_SECONDARY_EMAIL: "second@example.com" })).toEqual([
        "PUNCHCLOCK_SECONDARY_IDENTIFIER: secondary address and identifier must be set together",
      ]);
    });

    it("a malformed secondary identifier", () => {
      expect(
        issuesFor({
          ...base,
          PUNCHCLOCK_SECONDARY_EMAIL: "second@example.com",
          PUNCHCLOCK_SECONDARY_IDENTIFIER: "12.345.678-9",
        }),
      ).toEqual(["PUNCHCLOCK_SECONDARY_IDENTIFIER: is not a valid identifier"]);
    });

    it("a base64 secret that does not decode", () => {
      expect(() => loadConfig({ ...base, PUNCHCLOCK_IDENTIFIERS_B64: "not base64!" })).toThrow(
        "PUNCHCLOCK_IDENTIFIERS_B64 is not valid base64",
      );
    });
  });
});

describe("readSecret", () => {
  it("trims values and ignores blanks", () => {
    expect(readSecret({ NAME: "  value  " }, "NAME")).toBe("value");
    expect(readSecret({ NAME: "   " }, "NAME")).toBeUndefined();
    expect(readSecret({}, "NAME")).toBeUndefined();
  });
});
