import type { ActionKind } from "../../src/types/index.js";
import type { PortalConfig } from "../config/config.js";
import type { PortalWorkflow } from "./types.js";

/**
 * The portal's punch sequence: load the page, pick ENTRADA or SALIDA,
 * key the identifier in on the keypad and send it.
 */
export function buildPunchWorkflow(
  kind: ActionKind,
  identifier: string,
  config: PortalConfig,
): PortalWorkflow {
  return {
    name: `punch-${kind.toLowerCase()}`,
    steps: [
      {
        type: "navigate",
        url: config.url,
        retries: config.navigation.retries,
        retryDelayMs: config.navigation.retryDelayMs,
      },
      { type: "pause", ms: config.timings.afterLoadMs },
      {
        type: "clickText",
        selector: config.selectors.action,
        text: kind,
        settleMs: config.timings.afterActionMs,
      },
      {
        type: "typeKeypad",
        selector: config.selectors.keypadKey,
        value: identifier,
        keyPauseMs: config.timings.keyPauseMs,
        settleMs: config.timings.afterKeypadMs,
      },
      {
        type: "clickText",
        selector: config.selectors.submit,
        text: config.submitText,
        settleMs: config.timings.afterSubmitMs,
      },
    ],
  };
}
