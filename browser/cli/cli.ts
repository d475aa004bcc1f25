import pino from "pino";
import type { ActionExecutor, PunchclockConfig, RunReport } from "../../src/types/index.js";
import { loadConfig, ConfigError } from "../../src/config/config.js";
import { createLogger } from "../../src/observability/logger.js";
import { Punchclock } from "../../src/punchclock.js";
import { resolvePortalConfig } from "../config/config.js";
import { PortalExecutor } from "../executor/browser/browser.js";
import { SimulatedExecutor } from "../executor/simulated/simulated.js";
import { ArtifactStorage } from "../artifacts/storage/storage.js";

export const USAGE = "Usage: punchclock [--simulate] [--sequential] [--help]";

export interface CliArgs {
  simulate: boolean;
  sequential: boolean;
  help: boolean;
}

type Env = Record<string, string | undefined>;

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { simulate: false, sequential: false, help: false };
  for (const arg of argv) {
    switch (arg) {
      case "--simulate":
        args.simulate = true;
        break;
      case "--sequential":
        args.sequential = true;
        break;
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}\n${USAGE}`, [`unknown option ${arg}`]);
    }
  }
  return args;
}

/**
 * Flags win over the environment.
 */
export function resolveConfig(args: CliArgs, env: Env): PunchclockConfig {
  return loadConfig({
    ...env,
    ...(args.simulate ? { PUNCHCLOCK_SIMULATE: "true" } : {}),
    ...(args.sequential ? { PUNCHCLOCK_EXECUTION_MODE: "sequential" } : {}),
  });
}

export function createExecutor(config: PunchclockConfig, logger: pino.Logger): ActionExecutor {
  if (config.simulate) {
    return new SimulatedExecutor(undefined, config.timeZone, logger);
  }
  return new PortalExecutor(resolvePortalConfig(config.portal), {
    artifacts: new ArtifactStorage(config.artifactDir),
    timeZone: config.timeZone,
    logger,
  });
}

/** Exit code for a finished run. */
export function exitCode(report: RunReport): number {
  switch (report.status) {
    case "completed":
    case "inactive":
    case "holiday":
      return 0;
  }
}

/**
 * Entry point. Returns the process exit code: 0 for a finished run,
 * 1 for bad options or configuration, 2 for a crash.
 */
export async function main(argv: readonly string[], env: Env = process.env): Promise<number> {
  let config: PunchclockConfig;
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    config = resolveConfig(args, env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    console.error(err);
    return 2;
  }

  const { logger, file } = createLogger(config.logging, new Date(), config.timeZone);
  logger.info({ file, simulate: config.simulate }, "Logging to file");

  const punchclock = new Punchclock(config, {
    executor: createExecutor(config, logger),
    logger,
  });

  try {
    await punchclock.start();
    const report = await punchclock.run();
    logger.info({ runId: report.runId, status: report.status }, "Run ended");
    return exitCode(report);
  } catch (err) {
    logger.fatal({ err }, "Run crashed");
    return 2;
  } finally {
    await punchclock.shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
    });
  }
}
