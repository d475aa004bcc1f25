import { chromium, errors, type Browser, type Page } from "playwright-core";
import pino from "pino";
import type {
  ActionExecutor,
  ActionKind,
  ActionOutcome,
  FailureCategory,
  PerformContext,
} from "../../../src/types/index.js";
import { maskIdentifier } from "../../../src/identifier/identifier.js";
import {
  type Clock,
  type Sleep,
  systemClock,
  sleep as defaultSleep,
  formatTime,
  CHILE_TIME_ZONE,
} from "../../../src/clock/clock.js";
import type { Step, ClickTextStep, NavigateStep, TypeKeypadStep } from "../../dsl/types.js";
import { buildPunchWorkflow } from "../../dsl/punch.js";
import type { PortalConfig } from "../../config/config.js";
import type { ArtifactStorage } from "../../artifacts/storage/storage.js";

export interface StepResult {
  step: Step;
  success: boolean;
  durationMs: number;
  category?: FailureCategory;
  error?: string;
}

export class ElementNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ElementNotFoundError";
  }
}

export interface PortalExecutorOptions {
  artifacts?: ArtifactStorage;
  clock?: Clock;
  sleep?: Sleep;
  timeZone?: string;
  logger?: pino.Logger;
}

// Geolocation requests are answered with "denied" before any page script runs.
const DENY_GEOLOCATION = `
  navigator.geolocation.getCurrentPosition = function (success, error) {
    if (error) error({ code: 1, message: "User denied Geolocation" });
  };
  navigator.geolocation.watchPosition = function () { return null; };
`;

const BROWSER_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-geolocation",
];

export function categorize(err: unknown): FailureCategory {
  if (err instanceof errors.TimeoutError) return "timeout";
  if (err instanceof ElementNotFoundError) return "element-not-found";
  if (err instanceof Error) return "driver-error";
  return "unexpected";
}

/**
 * Performs a punch on the portal with a fresh headless Chromium per call.
 * Failures come back as `ActionOutcome` values; nothing is thrown.
 */
export class PortalExecutor implements ActionExecutor {
  private logger: pino.Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly timeZone: string;

  constructor(
    private readonly config: PortalConfig,
    private readonly options: PortalExecutorOptions = {},
  ) {
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "punchclock.portal",
    });
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.timeZone = options.timeZone ?? CHILE_TIME_ZONE;
  }

  async perform(
    identifier: string,
    kind: ActionKind,
    context: PerformContext,
  ): Promise<ActionOutcome> {
    const log = this.logger.child({
      correlationId: context.correlationId,
      identifier: maskIdentifier(identifier),
    });
    const startedAt = this.clock.now();
    const workflow = buildPunchWorkflow(kind, identifier, this.config);
    const trail: string[] = [];
    let browser: Browser | null = null;

    try {
      browser = await this.launch();
      const page = await this.openPage(browser);

      for (const step of workflow.steps) {
        const result = await this.execute(step, page);
        trail.push(describe(result));
        if (!result.success) {
          log.warn({ step: step.type, category: result.category, err: result.error }, "Portal step failed");
          await this.capture(page, context.correlationId, log);
          return {
            ok: false,
            category: result.category ?? "unexpected",
            error: result.error ?? `${step.type} failed`,
          };
        }
      }

      log.info({ kind, steps: trail.length }, "Punch submitted");
      return { ok: true, message: this.successMessage(kind, startedAt, trail) };
    } catch (err) {
      log.error({ err }, "Browser session failed");
      return { ok: false, category: categorize(err), error: errorMessage(err) };
    } finally {
      if (browser) {
        await browser.close().catch((err: unknown) => {
          log.warn({ err }, "Browser did not close cleanly");
        });
      }
    }
  }

  async execute(step: Step, page: Page): Promise<StepResult> {
    const start = this.clock.now().getTime();
    try {
      await this.dispatch(step, page);
      return {
        step,
        success: true,
        durationMs: this.clock.now().getTime() - start,
      };
    } catch (err) {
      return {
        step,
        success: false,
        durationMs: this.clock.now().getTime() - start,
        category: categorize(err),
        error: errorMessage(err),
      };
    }
  }

  private async dispatch(step: Step, page: Page): Promise<void> {
    switch (step.type) {
      case "navigate":
        return this.navigate(step, page);

      case "pause":
        return this.sleep(step.ms);

      case "clickText":
        return this.clickText(step, page);

      case "typeKeypad":
        return this.typeKeypad(step, page);
    }
  }

  private async launch(): Promise<Browser> {
    return chromium.launch({
      headless: this.config.headless,
      args: BROWSER_ARGS,
      ...(this.config.executablePath
        ? { executablePath: this.config.executablePath }
        : { channel: "chrome" }),
    });
  }

  private async openPage(browser: Browser): Promise<Page> {
    const ctx = await browser.newContext({
      viewport: this.config.viewport,
      permissions: [],
    });
    await ctx.addInitScript(DENY_GEOLOCATION);
    const page = await ctx.newPage();
    page.setDefaultTimeout(this.config.timeoutMs);
    page.setDefaultNavigationTimeout(this.config.timeoutMs);
    return page;
  }

  private async navigate(step: NavigateStep, page: Page): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await page.goto(step.url, { waitUntil: "load" });
        return;
      } catch (err) {
        if (attempt >= step.retries) throw err;
        this.logger.warn({ attempt, retries: step.retries, err: errorMessage(err) }, "Navigation failed, retrying");
        await this.sleep(step.retryDelayMs);
      }
    }
  }

  private async clickText(step: ClickTextStep, page: Page): Promise<void> {
    const candidates = page.locator(step.selector);
    const texts = await candidates.allInnerTexts();
    const index = texts.findIndex((t) => t.trim().toUpperCase() === step.text.toUpperCase());
    if (index < 0) {
      throw new ElementNotFoundError(`No "${step.text}" button found`);
    }
    await candidates.nth(index).click();
    await this.sleep(step.settleMs);
  }

  private async typeKeypad(step: TypeKeypadStep, page: Page): Promise<void> {
    const keys = page.locator(step.selector);
    await keys.first().waitFor({ state: "visible" });
    const labels = (await keys.allInnerTexts()).map((t) => t.trim().toUpperCase());

    const chars = [...step.value.toUpperCase()];
    for (const [i, char] of chars.entries()) {
      const index = labels.indexOf(char);
      if (index < 0) {
        // Position only: the character itself belongs to the identifier.
        throw new ElementNotFoundError(`No keypad key for character ${i + 1}/${chars.length}`);
      }
      await keys.nth(index).click();
      await this.sleep(step.keyPauseMs);
    }
    await this.sleep(step.settleMs);
  }

  private async capture(page: Page, correlationId: string, log: pino.Logger): Promise<void> {
    const artifacts = this.options.artifacts;
    if (!artifacts) return;
    try {
      const data = await page.screenshot({ fullPage: true });
      const createdAt = this.clock.now().getTime();
      const path = await artifacts.store({
        id: `${correlationId}-${createdAt}`,
        group: "screenshots",
        format: "png",
        data,
        createdAt,
      });
      log.info({ path }, "Failure screenshot stored");
    } catch (err) {
      log.warn({ err }, "Could not capture failure screenshot");
    }
  }

  private successMessage(kind: ActionKind, startedAt: Date, trail: readonly string[]): string {
    return [
      `✅ ${kind} completed at ${formatTime(startedAt, this.timeZone)} (Chile - CLT).`,
      "Geolocation: none",
      "",
      "Steps:",
      ...trail,
    ].join("\n");
  }
}

function describe(result: StepResult): string {
  const status = result.success ? "ok" : `failed (${result.category})`;
  return `${result.step.type} ${status} in ${result.durationMs}ms`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
