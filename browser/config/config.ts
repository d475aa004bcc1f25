import type { PortalSettings } from "../../src/types/index.js";

export interface PortalConfig {
  /** Punch page of the time-tracking portal */
  url: string;
  /** Default timeout for page loads and element waits */
  timeoutMs: number;
  /** Chrome/Chromium binary; falls back to an installed Chrome */
  executablePath?: string;
  headless: boolean;
  viewport: { width: number; height: number };
  navigation: {
    retries: number;
    retryDelayMs: number;
  };
  selectors: {
    /** Elements searched for the ENTRADA/SALIDA button */
    action: string;
    keypadKey: string;
    submit: string;
  };
  submitText: string;
  timings: {
    afterLoadMs: number;
    afterActionMs: number;
    keyPauseMs: number;
    afterKeypadMs: number;
    afterSubmitMs: number;
  };
}

export const defaultPortalConfig: PortalConfig = {
  url: "",
  timeoutMs: 30_000,
  headless: true,
  viewport: { width: 1920, height: 1080 },
  navigation: {
    retries: 3,
    retryDelayMs: 2_000,
  },
  selectors: {
    action: "button, div, span, li",
    keypadKey: "li.digits",
    submit: "li.pad-action.digits",
  },
  submitText: "ENVIAR",
  timings: {
    afterLoadMs: 2_000,
    afterActionMs: 2_000,
    keyPauseMs: 300,
    afterKeypadMs: 1_000,
    afterSubmitMs: 1_000,
  },
};

export function resolvePortalConfig(settings: PortalSettings): PortalConfig {
  return {
    ...defaultPortalConfig,
    url: settings.url ?? defaultPortalConfig.url,
    timeoutMs: settings.timeoutMs,
    ...(settings.executablePath ? { executablePath: settings.executablePath } : {}),
  };
}
