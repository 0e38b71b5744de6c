import { DeliveryError, LOG, RenderError } from "../src/utils/index.js";
import { createInstantDelay, createRecordingNotifier, createScriptedRenderer, makeCheckConfig, makeNotificationConfig } from "./helpers/fakes.js";
import { describe, expect, it, vi } from "vitest";
import type { AttemptResult } from "../src/types/index.js";
import { createEmailNotifier } from "../src/notify/index.js";
import { runCheck } from "../src/monitor/runner.js";

const ALIVE_PAGE = "<html><body><p>Status: I'm alive</p></body></html>";
const DOWN_PAGE = "<html><body><p>502 Bad Gateway</p></body></html>";

describe("monitor/runner", () => {

  it("succeeds on the first attempt without waiting or notifying", async () => {

    const renderer = createScriptedRenderer([{ document: ALIVE_PAGE }]);
    const notifier = createRecordingNotifier();
    const delay = createInstantDelay();

    const outcome = await runCheck(makeCheckConfig(), { delay, notifier, renderer });

    expect(outcome).toEqual({ attempt: 1, status: "succeeded" });
    expect(renderer.urls).toEqual(["https://app.example.com/health"]);
    expect(renderer.opened).toBe(1);
    expect(renderer.closed).toBe(1);
    expect(delay.calls).toEqual([]);
    expect(notifier.calls).toHaveLength(0);
  });

  it("waits once and succeeds on the second attempt", async () => {

    const renderer = createScriptedRenderer([ { document: DOWN_PAGE }, { document: ALIVE_PAGE } ]);
    const notifier = createRecordingNotifier();
    const delay = createInstantDelay();

    const outcome = await runCheck(makeCheckConfig(), { delay, notifier, renderer });

    expect(outcome).toEqual({ attempt: 2, status: "succeeded" });
    expect(delay.calls).toEqual([60000]);
    expect(renderer.closed).toBe(2);
    expect(notifier.calls).toHaveLength(0);
  });

  it("notifies exactly once after every attempt fails", async () => {

    const renderer = createScriptedRenderer([{ document: DOWN_PAGE }]);
    const notifier = createRecordingNotifier();
    const delay = createInstantDelay();
    const config = makeCheckConfig();

    const outcome = await runCheck(config, { delay, notifier, renderer });

    expect(outcome).toEqual({

      attempts: 2,
      notification: { messageId: "<test-1@example.com>", recipients: ["oncall@example.com"], status: "sent" },
      status: "exhausted"
    });

    expect(renderer.opened).toBe(2);
    expect(delay.calls).toEqual([60000]);
    expect(notifier.calls).toHaveLength(1);
    expect(notifier.calls[0].url).toBe("https://app.example.com/health");
    expect(notifier.calls[0].expectedText).toBe("I'm alive");
    expect(notifier.calls[0].settings).toBe(config.notification);
  });

  it("treats a rendering error like a missing marker and retries", async () => {

    const renderer = createScriptedRenderer([ { openError: new Error("net::ERR_CONNECTION_REFUSED") }, { document: ALIVE_PAGE } ]);
    const notifier = createRecordingNotifier();

    const delay = createInstantDelay();

    const outcome = await runCheck(makeCheckConfig({ maxAttempts: 3 }), { delay, notifier, renderer });

    expect(outcome).toEqual({ attempt: 2, status: "succeeded" });
    expect(renderer.opened).toBe(2);
    expect(renderer.closed).toBe(2);
    expect(delay.calls).toEqual([60000]);
    expect(notifier.calls).toHaveLength(0);
  });

  it("completes normally when email alerts are disabled", async () => {

    const factory = vi.fn();
    const config = makeCheckConfig({ notification: makeNotificationConfig({ enabled: false }) });

    const outcome = await runCheck(config, { delay: createInstantDelay(), notifier: createEmailNotifier(factory), renderer: createScriptedRenderer([{ document: DOWN_PAGE }]) });

    expect(outcome).toEqual({ attempts: 2, notification: { status: "disabled" }, status: "exhausted" });
    expect(factory).not.toHaveBeenCalled();
  });

  it("records a failed delivery without changing the terminal state", async () => {

    const failure = new DeliveryError("Failed to send alert email: Connection refused");
    const renderer = createScriptedRenderer([{ openError: new Error("timeout") }]);
    const notifier = createRecordingNotifier({ error: failure, status: "failed" });

    const outcome = await runCheck(makeCheckConfig(), { delay: createInstantDelay(), notifier, renderer });

    expect(outcome).toEqual({ attempts: 2, notification: { error: failure, status: "failed" }, status: "exhausted" });
    expect(notifier.calls).toHaveLength(1);
  });

  it("pauses between every pair of failed attempts but not after the last", async () => {

    const renderer = createScriptedRenderer([{ document: DOWN_PAGE }]);
    const delay = createInstantDelay();

    await runCheck(makeCheckConfig({ maxAttempts: 4, retryDelaySeconds: 5 }), { delay, notifier: createRecordingNotifier(), renderer });

    expect(delay.calls).toEqual([ 5000, 5000, 5000 ]);
    expect(renderer.opened).toBe(4);
  });

  it("passes a zero retry delay through", async () => {

    const delay = createInstantDelay();

    await runCheck(makeCheckConfig({ retryDelaySeconds: 0 }), { delay, notifier: createRecordingNotifier(), renderer: createScriptedRenderer([{ document: DOWN_PAGE }]) });

    expect(delay.calls).toEqual([0]);
  });

  it("goes straight to the alert when maxAttempts is zero", async () => {

    const renderer = createScriptedRenderer([{ document: ALIVE_PAGE }]);
    const notifier = createRecordingNotifier({ status: "disabled" });
    const delay = createInstantDelay();

    const outcome = await runCheck(makeCheckConfig({ maxAttempts: 0 }), { delay, notifier, renderer });

    expect(outcome).toEqual({ attempts: 0, notification: { status: "disabled" }, status: "exhausted" });
    expect(renderer.opened).toBe(0);
    expect(delay.calls).toEqual([]);
    expect(notifier.calls).toHaveLength(1);
  });

  it("counts a checker that throws as an errored attempt", async () => {

    const checker = vi.fn<(...args: unknown[]) => Promise<AttemptResult>>()
      .mockRejectedValueOnce(new TypeError("Cannot read properties of undefined"))
      .mockResolvedValueOnce({ status: "alive" });
    const warn = vi.spyOn(LOG, "warn");

    const outcome = await runCheck(makeCheckConfig(), {

      checker, delay: createInstantDelay(), notifier: createRecordingNotifier(), renderer: createScriptedRenderer([{ document: ALIVE_PAGE }])
    });

    expect(outcome).toEqual({ attempt: 2, status: "succeeded" });
    expect(checker).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith("Attempt %s failed: %s.", 1, "Unexpected error during attempt: Cannot read properties of undefined");
  });

  it("logs errored attempts with the rendering error", async () => {

    const warn = vi.spyOn(LOG, "warn");
    const checker = vi.fn<(...args: unknown[]) => Promise<AttemptResult>>()
      .mockResolvedValue({ error: new RenderError("Failed to load https://app.example.com/health: Navigation timeout of 30000 ms exceeded"), status: "errored" });

    await runCheck(makeCheckConfig({ maxAttempts: 1 }), {

      checker, delay: createInstantDelay(), notifier: createRecordingNotifier(), renderer: createScriptedRenderer([{ document: ALIVE_PAGE }])
    });

    expect(warn).toHaveBeenCalledWith("Attempt %s failed: %s.", 1, "Failed to load https://app.example.com/health: Navigation timeout of 30000 ms exceeded");
  });

  it("wraps a notifier that rejects into a failed delivery", async () => {

    const notifier = { notify: vi.fn().mockRejectedValue(new Error("socket hang up")) };

    const outcome = await runCheck(makeCheckConfig({ maxAttempts: 1 }), {

      delay: createInstantDelay(), notifier, renderer: createScriptedRenderer([{ document: DOWN_PAGE }])
    });

    expect(outcome.status).toBe("exhausted");

    if(outcome.status !== "exhausted") {

      return;
    }

    expect(outcome.notification.status).toBe("failed");

    if(outcome.notification.status !== "failed") {

      return;
    }

    expect(outcome.notification.error).toBeInstanceOf(DeliveryError);
    expect(outcome.notification.error.message).toBe("socket hang up");
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it("logs progress for each attempt", async () => {

    const info = vi.spyOn(LOG, "info");

    await runCheck(makeCheckConfig(), {

      delay: createInstantDelay(), notifier: createRecordingNotifier(), renderer: createScriptedRenderer([ { document: DOWN_PAGE }, { document: ALIVE_PAGE } ])
    });

    expect(info).toHaveBeenCalledWith("Attempt %s/%s...", 1, 2);
    expect(info).toHaveBeenCalledWith("Waiting %s before next attempt.", "1m 0s");
    expect(info).toHaveBeenCalledWith("Attempt %s/%s...", 2, 2);
    expect(info).toHaveBeenCalledWith("Application is alive.");
  });

  describe("cancellation", () => {

    it("does nothing when the signal is already aborted", async () => {

      const controller = new AbortController();
      const renderer = createScriptedRenderer([{ document: ALIVE_PAGE }]);
      const notifier = createRecordingNotifier();

      controller.abort();

      const outcome = await runCheck(makeCheckConfig(), { delay: createInstantDelay(), notifier, renderer, signal: controller.signal });

      expect(outcome).toEqual({ attempts: 0, status: "cancelled" });
      expect(renderer.opened).toBe(0);
      expect(notifier.calls).toHaveLength(0);
    });

    it("stops during the retry wait without notifying", async () => {

      const controller = new AbortController();
      const renderer = createScriptedRenderer([{ document: DOWN_PAGE }]);
      const notifier = createRecordingNotifier();
      const delay = createInstantDelay(() => controller.abort());

      const outcome = await runCheck(makeCheckConfig({ maxAttempts: 3 }), { delay, notifier, renderer, signal: controller.signal });

      expect(outcome).toEqual({ attempts: 1, status: "cancelled" });
      expect(delay.calls).toEqual([60000]);
      expect(renderer.opened).toBe(1);
      expect(renderer.closed).toBe(1);
      expect(notifier.calls).toHaveLength(0);
    });

    it("lets an in-flight attempt finish and skips the wait", async () => {

      const controller = new AbortController();
      const delay = createInstantDelay();
      const notifier = createRecordingNotifier();
      const checker = vi.fn(async (): Promise<AttemptResult> => {

        controller.abort();

        return { status: "not-alive" };
      });

      const outcome = await runCheck(makeCheckConfig({ maxAttempts: 3 }), {

        checker, delay, notifier, renderer: createScriptedRenderer([{ document: DOWN_PAGE }]), signal: controller.signal
      });

      expect(outcome).toEqual({ attempts: 1, status: "cancelled" });
      expect(checker).toHaveBeenCalledTimes(1);
      expect(delay.calls).toEqual([]);
      expect(notifier.calls).toHaveLength(0);
    });

    it("suppresses the alert when the signal fires during the final attempt", async () => {

      const controller = new AbortController();
      const notifier = createRecordingNotifier();
      const checker = vi.fn(async (): Promise<AttemptResult> => {

        controller.abort();

        return { status: "not-alive" };
      });

      const outcome = await runCheck(makeCheckConfig({ maxAttempts: 1 }), {

        checker, delay: createInstantDelay(), notifier, renderer: createScriptedRenderer([{ document: DOWN_PAGE }]), signal: controller.signal
      });

      expect(outcome).toEqual({ attempts: 1, status: "cancelled" });
      expect(notifier.calls).toHaveLength(0);
    });

    it("still returns success when the signal fires during a successful attempt", async () => {

      const controller = new AbortController();
      const checker = vi.fn(async (): Promise<AttemptResult> => {

        controller.abort();

        return { status: "alive" };
      });

      const outcome = await runCheck(makeCheckConfig(), {

        checker, delay: createInstantDelay(), notifier: createRecordingNotifier(), renderer: createScriptedRenderer([{ document: ALIVE_PAGE }]), signal: controller.signal
      });

      expect(outcome).toEqual({ attempt: 1, status: "succeeded" });
    });
  });
});
