/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runner.ts: Bounded-retry check run for pagepulse.
 */
import type { AlertNotifier, AttemptResult, CheckConfig, DelayFunction, NotifyResult, PageRenderer, RunOutcome } from "../types/index.js";
import { DeliveryError, LOG, RenderError, delay, formatDuration, formatError } from "../utils/index.js";
import { checkLiveness } from "./checker.js";

/* A run is a small state machine:
 *
 *   Attempting(1) -> alive -> Succeeded
 *   Attempting(n) -> not alive / errored, n < maxAttempts -> wait retryDelaySeconds -> Attempting(n + 1)
 *   Attempting(n) -> not alive / errored, n = maxAttempts -> Exhausted -> one notification
 *
 * Exhausted is reached only after every attempt failed, and the notifier is called exactly once there. Its result is recorded but never changes the terminal
 * state, and a failed alert is not retried. With maxAttempts at zero the loop body never runs and the run goes straight to Exhausted.
 *
 * Cancellation is optional. When the caller passes an AbortSignal, the runner checks it before each attempt and wakes up from the retry wait as soon as it fires.
 * A cancelled run sends no alert. An attempt already in progress is allowed to finish so its browser session is released normally.
 */

/**
 * A single-attempt check. The default is checkLiveness().
 */
export type AttemptChecker = (renderer: PageRenderer, url: string, expectedText: string) => Promise<AttemptResult>;

/**
 * Collaborators of a run. Only the renderer and notifier are required; the rest default to the production implementations.
 */
export interface CheckRunnerDeps {

  checker?: AttemptChecker;
  delay?: DelayFunction;
  notifier: AlertNotifier;
  renderer: PageRenderer;
  signal?: AbortSignal;
}

/**
 * Runs one attempt, converting anything the checker throws into an "errored" result so that an unexpected fault uses up an attempt instead of aborting the run.
 * @param checker - The attempt checker.
 * @param renderer - The rendering capability.
 * @param config - The check configuration.
 * @returns The attempt result.
 */
async function runAttempt(checker: AttemptChecker, renderer: PageRenderer, config: CheckConfig): Promise<AttemptResult> {

  try {

    return await checker(renderer, config.url, config.expectedText);
  } catch(error) {

    return { error: RenderError.from(error, "Unexpected error during attempt"), status: "errored" };
  }
}

/**
 * Sends the alert for an exhausted run. A notifier that rejects despite its contract is treated as a failed delivery.
 * @param notifier - The notification capability.
 * @param config - The check configuration.
 * @returns The notification result.
 */
async function sendAlert(notifier: AlertNotifier, config: CheckConfig): Promise<NotifyResult> {

  try {

    return await notifier.notify(config.notification, config.url, config.expectedText);
  } catch(error) {

    return { error: (error instanceof DeliveryError) ? error : new DeliveryError(formatError(error), { cause: error }), status: "failed" };
  }
}

/**
 * Logs the final disposition of an exhausted run. Delivery details are logged by the notifier itself.
 * @param attempts - The number of attempts made.
 * @param result - The notification result.
 */
function logExhausted(attempts: number, result: NotifyResult): void {

  switch(result.status) {

    case "disabled": {

      LOG.warn("Check finished: application down after %s attempts. Email alerts are disabled.", attempts);

      break;
    }

    case "sent": {

      LOG.warn("Check finished: application down after %s attempts. Alert sent to %s.", attempts, result.recipients.join(", "));

      break;
    }

    case "failed": {

      LOG.error("Check finished: application down after %s attempts. The alert could not be delivered.", attempts);

      break;
    }
  }
}

/**
 * Runs a complete check: up to maxAttempts attempts with a fixed pause between them, and one alert if all of them fail. The returned promise always resolves;
 * attempt failures and alert delivery failures are reported through the outcome.
 * @param config - The check configuration.
 * @param deps - The run's collaborators.
 * @returns The terminal outcome of the run.
 */
export async function runCheck(config: CheckConfig, deps: CheckRunnerDeps): Promise<RunOutcome> {

  const checker = deps.checker ?? checkLiveness;
  const wait = deps.delay ?? delay;
  const { signal } = deps;
  const retryDelayMs = config.retryDelaySeconds * 1000;
  let attempts = 0;

  while(attempts < config.maxAttempts) {

    if(signal?.aborted) {

      LOG.warn("Check cancelled after %s of %s attempts.", attempts, config.maxAttempts);

      return { attempts, status: "cancelled" };
    }

    attempts++;

    LOG.info("Attempt %s/%s...", attempts, config.maxAttempts);

    // eslint-disable-next-line no-await-in-loop
    const result = await runAttempt(checker, deps.renderer, config);

    if(result.status === "alive") {

      LOG.info("Application is alive.");

      return { attempt: attempts, status: "succeeded" };
    }

    if(result.status === "errored") {

      LOG.warn("Attempt %s failed: %s.", attempts, formatError(result.error));
    } else {

      LOG.warn("Application is NOT alive on attempt %s: expected text not found.", attempts);
    }

    // Pause only when another attempt follows.
    if((attempts < config.maxAttempts) && !signal?.aborted) {

      LOG.info("Waiting %s before next attempt.", formatDuration(retryDelayMs));

      // eslint-disable-next-line no-await-in-loop
      await wait(retryDelayMs, signal);
    }
  }

  // A signal that fired during the final attempt still suppresses the alert.
  if(signal?.aborted) {

    LOG.warn("Check cancelled after %s of %s attempts.", attempts, config.maxAttempts);

    return { attempts, status: "cancelled" };
  }

  LOG.error("Application still down after %s attempts. Sending alert.", attempts);

  const notification = await sendAlert(deps.notifier, config);

  logExhausted(attempts, notification);

  return { attempts, notification, status: "exhausted" };
}
