import { EXIT_CODES, exitCodeFor, runMonitor } from "../src/app.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRecordingNotifier, createScriptedRenderer } from "./helpers/fakes.js";
import fs from "node:fs";
import { isolateConfigEnv } from "./helpers/env.js";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("app/exitCodeFor", () => {

  it("maps each outcome to its exit code", () => {

    expect(exitCodeFor({ attempt: 1, status: "succeeded" })).toBe(0);
    expect(exitCodeFor({ attempts: 2, notification: { status: "disabled" }, status: "exhausted" })).toBe(2);
    expect(exitCodeFor({ attempts: 1, status: "cancelled" })).toBe(130);
  });
});

describe("app/runMonitor", () => {

  isolateConfigEnv(["PAGEPULSE_DATA_DIR"]);

  let dataDir: string;

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "pagepulse-app-"));
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  async function writeConfig(config: Record<string, unknown>): Promise<void> {

    await fsPromises.writeFile(path.join(dataDir, "config.json"), JSON.stringify(config), "utf-8");
  }

  it("creates a template and stops when there is no configuration", async () => {

    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    const code = await runMonitor({ consoleLogging: false, dataDir, debugLogging: false });

    expect(code).toBe(EXIT_CODES.failure);
    expect(JSON.parse(await fsPromises.readFile(path.join(dataDir, "config.json"), "utf-8"))).toMatchObject({ url: "https://example.com/" });
    expect(stderr).toHaveBeenCalledWith("A template configuration file was created at " + path.join(dataDir, "config.json") + ". Edit it and run pagepulse again.");
  });

  it("stops on an invalid configuration", async () => {

    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    await writeConfig({ expected_text: "OK" });

    expect(await runMonitor({ consoleLogging: false, dataDir, debugLogging: false })).toBe(EXIT_CODES.failure);
    expect(stderr).toHaveBeenCalledWith("Configuration validation failed:\n  url is required");
  });

  it("exits with 0 and logs to the data directory when the page is alive", async () => {

    await writeConfig({ expected_text: "I'm alive", max_attempts: 1, url: "https://app.example.com/" });

    const renderer = createScriptedRenderer([{ document: "<p>I'm alive</p>" }]);
    const code = await runMonitor({ consoleLogging: false, dataDir, debugLogging: false }, { createRenderer: () => renderer, notifier: createRecordingNotifier() });

    expect(code).toBe(EXIT_CODES.alive);
    expect(renderer.urls).toEqual(["https://app.example.com/"]);

    const log = await fsPromises.readFile(path.join(dataDir, "pagepulse.log"), "utf-8");

    expect(log).toContain("] Attempt 1/1...\n");
    expect(log).toContain("] Application is alive.\n");
  });

  it("exits with 2 after sending the alert", async () => {

    await writeConfig({

      email: { enabled: true, from: "monitor@example.com", smtp_host: "smtp.example.com", to: ["oncall@example.com"] },
      expected_text: "I'm alive",
      max_attempts: 1,
      url: "https://app.example.com/"
    });

    const notifier = createRecordingNotifier();
    const logFile = path.join(dataDir, "custom", "check.log");
    const code = await runMonitor({ consoleLogging: false, dataDir, debugLogging: false, logFile }, {

      createRenderer: () => createScriptedRenderer([{ document: "<p>Maintenance</p>" }]),
      notifier
    });

    expect(code).toBe(EXIT_CODES.exhausted);
    expect(notifier.calls).toHaveLength(1);
    expect(notifier.calls[0].settings.to).toEqual(["oncall@example.com"]);
    expect(await fsPromises.readFile(logFile, "utf-8")).toContain("Application still down after 1 attempts. Sending alert.");
  });
});
