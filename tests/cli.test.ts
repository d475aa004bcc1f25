import { describe, it, expect, vi, afterEach } from "vitest";
import { parseArgs, resolveConfig, createExecutor, exitCode, main, USAGE } from "../browser/cli/cli.js";
import { ConfigError } from "../src/config/config.js";
import { SimulatedExecutor } from "../browser/executor/simulated/simulated.js";
import { PortalExecutor } from "../browser/executor/browser/browser.js";
import { silentLogger, testConfig } from "./helpers.js";

const env = {
  PUNCHCLOCK_ACTIVE: "true",
  PUNCHCLOCK_IDENTIFIERS: '["11111111k"]',
  PUNCHCLOCK_EMAIL_ADDRESS: "primary@example.com",
  PUNCHCLOCK_EMAIL_PASSWORD: "test-secret",
  PUNCHCLOCK_PORTAL_URL: "https://portal.example.test/punch",
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseArgs", () => {
  it("reads the known flags", () => {
    expect(parseArgs([])).toEqual({ simulate: false, sequential: false, help: false });
    expect(parseArgs(["--simulate", "--sequential", "-h"])).toEqual({
      simulate: true,
      sequential: true,
      help: true,
    });
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--force"])).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("lets flags override the environment", () => {
    const config = resolveConfig(
      { simulate: true, sequential: true, help: false },
      { ...env, PUNCHCLOCK_SIMULATE: "false", PUNCHCLOCK_EXECUTION_MODE: "concurrent" },
    );

    expect(config.simulate).toBe(true);
    expect(config.execution.mode).toBe("sequential");
  });

  it("keeps the environment when no flag is given", () => {
    const config = resolveConfig({ simulate: false, sequential: false, help: false }, env);

    expect(config.simulate).toBe(false);
    expect(config.execution.mode).toBe("concurrent");
  });
});

describe("createExecutor", () => {
  it("picks the simulated executor in simulation mode", () => {
    expect(createExecutor(testConfig({ simulate: true }), silentLogger)).toBeInstanceOf(SimulatedExecutor);
  });

  it("picks the portal executor otherwise", () => {
    const config = testConfig({ simulate: false, portal: { url: "https://portal.example.test", timeoutMs: 1_000 } });
    expect(createExecutor(config, silentLogger)).toBeInstanceOf(PortalExecutor);
  });
});

describe("exitCode", () => {
  it("is zero for every finished run", () => {
    expect(exitCode({ runId: "r", status: "completed", results: [] })).toBe(0);
    expect(exitCode({ runId: "r", status: "inactive", results: [] })).toBe(0);
  });
});

describe("main", () => {
  it("prints usage for --help", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(await main(["--help"], {})).toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it("exits with 1 on an unknown option", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await main(["--force"], env)).toBe(1);
    expect(error).toHaveBeenCalledWith(`Unknown option: --force\n${USAGE}`);
  });

  it("exits with 1 on invalid configuration", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await main([], { ...env, PUNCHCLOCK_IDENTIFIERS: "[]" })).toBe(1);
  });
});
