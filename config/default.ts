/**
 * Default punchclock settings.
 * Every value can be overridden through the matching PUNCHCLOCK_* variable.
 */
export const defaultConfig = {
  execution: {
    mode: "concurrent",
    maxWorkers: 2,
    retryAttempts: 3,
    retryDelaySeconds: 30,
    breakerThreshold: 3,
    breakerResetSeconds: 60,
    metrics: true,
  },

  smtp: {
    host: "smtp.gmail.com",
    port: 587,
  },

  portal: {
    timeoutMs: 30_000,
  },

  holidays: {
    apiUrl: "https://api.boostr.cl/holidays.json",
    timeoutMs: 5_000,
  },

  logging: {
    level: "info",
    dir: "./logs",
    runNumber: "local",
  },

  artifactDir: "./artifacts",

  kafka: {
    clientId: "punchclock",
    topicPrefix: "punchclock",
  },

  observability: {
    serviceName: "punchclock",
    metricsInterval: 15_000,
  },

  timeZone: "America/Santiago",
} as const;

/** Hard limits enforced when the configuration is loaded. */
export const limits = {
  maxWorkers: { min: 1, max: 10 },
  retryAttempts: { min: 0, max: 10 },
  retryDelaySeconds: { min: 1, max: 300 },
  breakerThreshold: { min: 1, max: 20 },
  breakerResetSeconds: { min: 1, max: 3600 },
  identifiers: { min: 1, max: 10 },
} as const;
