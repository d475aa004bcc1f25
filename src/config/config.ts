import { z } from "zod";
import { defaultConfig, limits } from "../../config/default.js";
import { isValidIdentifier } from "../identifier/identifier.js";
import type { PunchclockConfig } from "../types/index.js";

/**
 * Thrown for any missing or malformed setting. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Read `NAME_B64` (base64, wins) or `NAME` (plain).
 */
export function readSecret(env: Env, name: string): string | undefined {
  const encoded = env[`${name}_B64`]?.trim();
  if (encoded) {
    if (!BASE64.test(encoded)) {
      throw new ConfigError(`${name}_B64 is not valid base64`);
    }
    return Buffer.from(encoded, "base64").toString("utf-8").trim();
  }
  const plain = env[name]?.trim();
  return plain ? plain : undefined;
}

const blankToUndefined = (v: unknown): unknown =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((v) => (v === undefined ? fallback : v.trim().toLowerCase() === "true")),
  );

const intInRange = (range: { min: number; max: number }, fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(range.min).max(range.max).default(fallback),
  );

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const tokenList = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array" });
      return z.NEVER;
    }
  })
  .pipe(z.array(z.union([z.string(), z.number()])).transform((items) => items.map((i) => String(i).trim())));

const identifierList = tokenList.superRefine((ids, ctx) => {
  if (ids.length < limits.identifiers.min || ids.length > limits.identifiers.max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must hold between ${limits.identifiers.min} and ${limits.identifiers.max} identifiers`,
    });
  }
  const seen = new Set<string>();
  ids.forEach((id, index) => {
    if (!isValidIdentifier(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `entry ${index + 1} is not a valid identifier`,
      });
    }
    const key = id.toLowerCase();
    if (seen.has(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `entry ${index + 1} is a duplicate` });
    }
    seen.add(key);
  });
});

const emailAddress = z.string().trim().email();

const envSchema = z
  .object({
    active: flag(false),
    simulate: flag(false),
    identifiers: z.string({ required_error: "is required" }).pipe(identifierList),
    exceptions: z.preprocess(blankToUndefined, tokenList.optional()),
    primary: z.string({ required_error: "is required" }).pipe(emailAddress),
    password: optionalString,
    secondaryAddress: z.preprocess(blankToUndefined, emailAddress.optional()),
    secondaryIdentifier: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .refine(isValidIdentifier, { message: "is not a valid identifier" })
        .optional(),
    ),
    mode: z.preprocess(
      blankToUndefined,
      z.enum(["sequential", "concurrent"]).default(defaultConfig.execution.mode),
    ),
    maxWorkers: intInRange(limits.maxWorkers, defaultConfig.execution.maxWorkers),
    retryAttempts: intInRange(limits.retryAttempts, defaultConfig.execution.retryAttempts),
    retryDelaySeconds: intInRange(limits.retryDelaySeconds, defaultConfig.execution.retryDelaySeconds),
    breakerThreshold: intInRange(limits.breakerThreshold, defaultConfig.execution.breakerThreshold),
    breakerResetSeconds: intInRange(limits.breakerResetSeconds, defaultConfig.execution.breakerResetSeconds),
    metrics: flag(defaultConfig.execution.metrics),
    portalUrl: z.preprocess(blankToUndefined, z.string().url().optional()),
    chromePath: optionalString,
    smtpHost: z.preprocess(blankToUndefined, z.string().default(defaultConfig.smtp.host)),
    smtpPort: intInRange({ min: 1, max: 65535 }, defaultConfig.smtp.port),
    holidayApiUrl: z.preprocess(blankToUndefined, z.string().url().default(defaultConfig.holidays.apiUrl)),
    logLevel: z.preprocess(
      blankToUndefined,
      z.enum(["debug", "info", "warn", "error"]).default(defaultConfig.logging.level),
    ),
    logDir: z.preprocess(blankToUndefined, z.string().default(defaultConfig.logging.dir)),
    runNumber: z.preprocess(blankToUndefined, z.string().default(defaultConfig.logging.runNumber)),
    artifactDir: z.preprocess(blankToUndefined, z.string().default(defaultConfig.artifactDir)),
    kafkaBrokers: optionalString,
    kafkaClientId: z.preprocess(blankToUndefined, z.string().default(defaultConfig.kafka.clientId)),
    kafkaTopicPrefix: z.preprocess(blankToUndefined, z.string().default(defaultConfig.kafka.topicPrefix)),
    serviceName: z.preprocess(blankToUndefined, z.string().default(defaultConfig.observability.serviceName)),
    traceEndpoint: z.preprocess(blankToUndefined, z.string().url().optional()),
    metricsEndpoint: z.preprocess(blankToUndefined, z.string().url().optional()),
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.simulate && !cfg.password) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["password"],
        message: "is required outside simulation mode",
      });
    }
    if (!cfg.simulate && !cfg.portalUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["portalUrl"],
        message: "is required outside simulation mode",
      });
    }
    if (Boolean(cfg.secondaryAddress) !== Boolean(cfg.secondaryIdentifier)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["secondaryIdentifier"],
        message: "secondary address and identifier must be set together",
      });
    }
  });

/** Schema field → environment variable, for error messages. */
const VARIABLES: Record<string, string> = {
  active: "PUNCHCLOCK_ACTIVE",
  simulate: "PUNCHCLOCK_SIMULATE",
  identifiers: "PUNCHCLOCK_IDENTIFIERS",
  exceptions: "PUNCHCLOCK_EXCEPTIONS",
  primary: "PUNCHCLOCK_EMAIL_ADDRESS",
  password: "PUNCHCLOCK_EMAIL_PASSWORD",
  secondaryAddress: "PUNCHCLOCK_SECONDARY_EMAIL",
  secondaryIdentifier: "PUNCHCLOCK_SECONDARY_IDENTIFIER",
  mode: "PUNCHCLOCK_EXECUTION_MODE",
  maxWorkers: "PUNCHCLOCK_MAX_WORKERS",
  retryAttempts: "PUNCHCLOCK_RETRY_ATTEMPTS",
  retryDelaySeconds: "PUNCHCLOCK_RETRY_DELAY_SECONDS",
  breakerThreshold: "PUNCHCLOCK_BREAKER_THRESHOLD",
  breakerResetSeconds: "PUNCHCLOCK_BREAKER_RESET_SECONDS",
  metrics: "PUNCHCLOCK_METRICS",
  portalUrl: "PUNCHCLOCK_PORTAL_URL",
  chromePath: "PUNCHCLOCK_CHROME_PATH",
  smtpHost: "PUNCHCLOCK_SMTP_HOST",
  smtpPort: "PUNCHCLOCK_SMTP_PORT",
  holidayApiUrl: "PUNCHCLOCK_HOLIDAY_API_URL",
  logLevel: "PUNCHCLOCK_LOG_LEVEL",
  logDir: "PUNCHCLOCK_LOG_DIR",
  runNumber: "PUNCHCLOCK_RUN_NUMBER",
  artifactDir: "PUNCHCLOCK_ARTIFACT_DIR",
  kafkaBrokers: "PUNCHCLOCK_KAFKA_BROKERS",
  kafkaClientId: "PUNCHCLOCK_KAFKA_CLIENT_ID",
  kafkaTopicPrefix: "PUNCHCLOCK_KAFKA_TOPIC_PREFIX",
  serviceName: "PUNCHCLOCK_SERVICE_NAME",
  traceEndpoint: "PUNCHCLOCK_OTLP_TRACES_ENDPOINT",
  metricsEndpoint: "PUNCHCLOCK_OTLP_METRICS_ENDPOINT",
};

/**
 * Build and validate the configuration from environment variables.
 * Throws {@link ConfigError} listing every problem found.
 */
export function loadConfig(env: Env = process.env): PunchclockConfig {
  const input = {
    active: env.PUNCHCLOCK_ACTIVE,
    simulate: env.PUNCHCLOCK_SIMULATE,
    identifiers: readSecret(env, "PUNCHCLOCK_IDENTIFIERS"),
    exceptions: readSecret(env, "PUNCHCLOCK_EXCEPTIONS"),
    primary: readSecret(env, "PUNCHCLOCK_EMAIL_ADDRESS"),
    password: readSecret(env, "PUNCHCLOCK_EMAIL_PASSWORD"),
    secondaryAddress: readSecret(env, "PUNCHCLOCK_SECONDARY_EMAIL"),
    secondaryIdentifier: readSecret(env, "PUNCHCLOCK_SECONDARY_IDENTIFIER"),
    mode: env.PUNCHCLOCK_EXECUTION_MODE,
    maxWorkers: env.PUNCHCLOCK_MAX_WORKERS,
    retryAttempts: env.PUNCHCLOCK_RETRY_ATTEMPTS,
    retryDelaySeconds: env.PUNCHCLOCK_RETRY_DELAY_SECONDS,
    breakerThreshold: env.PUNCHCLOCK_BREAKER_THRESHOLD,
    breakerResetSeconds: env.PUNCHCLOCK_BREAKER_RESET_SECONDS,
    metrics: env.PUNCHCLOCK_METRICS,
    portalUrl: env.PUNCHCLOCK_PORTAL_URL,
    chromePath: env.PUNCHCLOCK_CHROME_PATH,
    smtpHost: env.PUNCHCLOCK_SMTP_HOST,
    smtpPort: env.PUNCHCLOCK_SMTP_PORT,
    holidayApiUrl: env.PUNCHCLOCK_HOLIDAY_API_URL,
    logLevel: env.PUNCHCLOCK_LOG_LEVEL,
    logDir: env.PUNCHCLOCK_LOG_DIR,
    runNumber: env.PUNCHCLOCK_RUN_NUMBER,
    artifactDir: env.PUNCHCLOCK_ARTIFACT_DIR,
    kafkaBrokers: env.PUNCHCLOCK_KAFKA_BROKERS,
    kafkaClientId: env.PUNCHCLOCK_KAFKA_CLIENT_ID,
    kafkaTopicPrefix: env.PUNCHCLOCK_KAFKA_TOPIC_PREFIX,
    serviceName: env.PUNCHCLOCK_SERVICE_NAME,
    traceEndpoint: env.PUNCHCLOCK_OTLP_TRACES_ENDPOINT,
    metricsEndpoint: env.PUNCHCLOCK_OTLP_METRICS_ENDPOINT,
  };

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? "");
      return `${VARIABLES[field] ?? field}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }

  const cfg = parsed.data;
  const brokers = (cfg.kafkaBrokers ?? "")
    .split(",")
    .map((b) => b.trim())
    .filter(Boolean);

  return {
    active: cfg.active,
    simulate: cfg.simulate,
    identifiers: cfg.identifiers,
    exceptions: cfg.exceptions ?? [],
    notifications: {
      primary: cfg.primary,
      ...(cfg.secondaryAddress && cfg.secondaryIdentifier
        ? { secondary: { address: cfg.secondaryAddress, identifier: cfg.secondaryIdentifier } }
        : {}),
      smtp: {
        host: cfg.smtpHost,
        port: cfg.smtpPort,
        user: cfg.primary,
        password: cfg.password ?? "",
      },
    },
    execution: {
      mode: cfg.mode,
      maxWorkers: cfg.maxWorkers,
      retryAttempts: cfg.retryAttempts,
      retryDelaySeconds: cfg.retryDelaySeconds,
      breakerThreshold: cfg.breakerThreshold,
      breakerResetSeconds: cfg.breakerResetSeconds,
      metrics: cfg.metrics,
    },
    portal: {
      ...(cfg.portalUrl ? { url: cfg.portalUrl } : {}),
      ...(cfg.chromePath ? { executablePath: cfg.chromePath } : {}),
      timeoutMs: defaultConfig.portal.timeoutMs,
    },
    holidays: {
      apiUrl: cfg.holidayApiUrl,
      timeoutMs: defaultConfig.holidays.timeoutMs,
    },
    logging: {
      level: cfg.logLevel,
      dir: cfg.logDir,
      runNumber: cfg.runNumber,
    },
    artifactDir: cfg.artifactDir,
    ...(brokers.length > 0
      ? {
          kafka: {
            brokers,
            clientId: cfg.kafkaClientId,
            topicPrefix: cfg.kafkaTopicPrefix,
          },
        }
      : {}),
    observability: {
      serviceName: cfg.serviceName,
      ...(cfg.traceEndpoint ? { traceEndpoint: cfg.traceEndpoint } : {}),
      ...(cfg.metricsEndpoint ? { metricsEndpoint: cfg.metricsEndpoint } : {}),
      metricsInterval: defaultConfig.observability.metricsInterval,
    },
    timeZone: defaultConfig.timeZone,
  };
}
