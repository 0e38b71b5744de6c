/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Headless Chrome page rendering for pagepulse.
 */
import type { BrowserConfig, PageRenderer, RenderSession } from "../types/index.js";
import type { GoToOptions, LaunchOptions } from "puppeteer-core";
import { LOG, RenderError, formatError, startTimer } from "../utils/index.js";
import fs from "node:fs";
import { launch as puppeteerLaunch } from "puppeteer-core";

/* Every check attempt gets its own Chrome process with a throwaway profile. Nothing carries over between attempts: no cookies, no cache, no service workers. That
 * way a retry sees the target the way a first-time visitor would. Puppeteer creates and removes the temporary profile directory itself when no userDataDir is
 * given.
 *
 * The narrow RenderBrowser and RenderPage interfaces describe the slice of Puppeteer this module uses. Puppeteer's own launch() satisfies BrowserLauncher, and
 * tests substitute an in-memory browser.
 */

/**
 * The page operations used to render a target.
 */
export interface RenderPage {

  content: () => Promise<string>;
  goto: (url: string, options?: GoToOptions) => Promise<{ status: () => number } | null>;
}

/**
 * The browser operations used by a session.
 */
export interface RenderBrowser {

  close: () => Promise<void>;
  newPage: () => Promise<RenderPage>;
  process: () => { kill: (signal?: NodeJS.Signals) => boolean } | null;
}

/**
 * Launches a browser. Defaults to Puppeteer's launch().
 */
export type BrowserLauncher = (options: LaunchOptions) => Promise<RenderBrowser>;

// How long to wait for Chrome to exit through the DevTools protocol before killing the process.
const BROWSER_CLOSE_TIMEOUT = 5000;

// How long Puppeteer waits for a freshly spawned Chrome to accept DevTools connections.
const BROWSER_LAUNCH_TIMEOUT = 30000;

/**
 * Locates the Chrome executable on the system. A configured path (config.json or CHROME_BIN) takes precedence. Otherwise, we search common installation paths
 * across macOS, Linux, and Windows.
 * @param config - The browser configuration.
 * @param exists - Filesystem probe, replaceable in tests.
 * @returns Path to the Chrome executable.
 * @throws RenderError if no Chrome installation is found.
 */
export function getExecutablePath(config: BrowserConfig, exists: (candidate: string) => boolean = fs.existsSync): string {

  if(config.executablePath) {

    return config.executablePath;
  }

  const paths = [

    // macOS.
    "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",

    // Linux. Distribution packages use different names for Chrome and Chromium.
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser",

    // Windows. Both 64-bit and 32-bit installations are checked.
    "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
    "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe"
  ];

  const found = paths.find((candidate) => exists(candidate));

  if(found) {

    return found;
  }

  throw new RenderError("No Chrome installation found. Set CHROME_BIN or browser.executable_path in config.json.");
}

/**
 * Assembles the Puppeteer launch options for a check session.
 *
 * --no-sandbox and --disable-dev-shm-usage let Chrome start inside containers and under service accounts, where the sandbox is unavailable and /dev/shm is
 * small. The remaining flags keep Chrome from doing unrelated work (background networking, first-run UI, notification prompts) during a one-shot check.
 * @param config - The browser configuration.
 * @returns Puppeteer launch options.
 * @throws RenderError if no Chrome executable can be found.
 */
export function buildLaunchOptions(config: BrowserConfig): LaunchOptions {

  return {

    args: [

      "--disable-background-networking",
      "--disable-dev-shm-usage",
      "--disable-notifications",
      "--hide-crash-restore-bubble",
      "--no-first-run",
      "--no-sandbox"
    ],

    executablePath: getExecutablePath(config),
    headless: config.headless,
    timeout: BROWSER_LAUNCH_TIMEOUT
  };
}

/**
 * Returns whether an error is Puppeteer's navigation timeout.
 * @param error - The error thrown by page.goto().
 * @returns True for a TimeoutError.
 */
function isNavigationTimeout(error: unknown): boolean {

  return (error instanceof Error) && (error.name === "TimeoutError");
}

/**
 * Closes a browser, killing the process if Chrome does not exit within BROWSER_CLOSE_TIMEOUT.
 * @param browser - The browser to close.
 */
async function closeBrowser(browser: RenderBrowser): Promise<void> {

  let timer: ReturnType<typeof setTimeout> | undefined;

  try {

    await Promise.race([
      browser.close(),
      new Promise<never>((_, reject) => {

        timer = setTimeout(() => { reject(new Error("Browser close timed out")); }, BROWSER_CLOSE_TIMEOUT);
      })
    ]);

    LOG.debug("browser", "Browser closed.");
  } catch(error) {

    LOG.warn("Browser did not close cleanly (%s). Forcing termination.", formatError(error));

    browser.process()?.kill("SIGKILL");
  } finally {

    clearTimeout(timer);
  }
}

/**
 * Launches a browser and wraps it in a session.
 * @param config - The browser configuration.
 * @param launcher - The browser launcher.
 * @returns A session owning the launched browser.
 * @throws RenderError if Chrome cannot be found or launched.
 */
async function openBrowserSession(config: BrowserConfig, launcher: BrowserLauncher): Promise<RenderSession> {

  const elapsed = startTimer();
  let browser: RenderBrowser;

  try {

    browser = await launcher(buildLaunchOptions(config));
  } catch(error) {

    throw RenderError.from(error, "Failed to launch Chrome");
  }

  LOG.debug("browser", "Chrome launched in %sms.", elapsed());

  let closed = false;

  return {

    close: async (): Promise<void> => {

      if(closed) {

        return;
      }

      closed = true;

      await closeBrowser(browser);
    },

    open: async (url: string): Promise<string> => {

      const navElapsed = startTimer();

      try {

        const page = await browser.newPage();

        try {

          const response = await page.goto(url, { timeout: config.navigationTimeout, waitUntil: "networkidle2" });

          LOG.debug("browser", "Loaded %s in %sms (HTTP %s).", url, navElapsed(), response ? response.status() : "no response");
        } catch(error) {

          // Pages that poll or hold analytics connections open never reach network idle. What has rendered by the deadline is still checked.
          if(!isNavigationTimeout(error)) {

            throw error;
          }

          LOG.warn("Page navigation timed out after %sms for %s. Checking the content rendered so far.", config.navigationTimeout, url);
        }

        return await page.content();
      } catch(error) {

        throw RenderError.from(error, [ "Failed to load ", url ].join(""));
      }
    }
  };
}

/**
 * Creates the production page renderer. Each session is a separate Chrome process.
 * @param config - The browser configuration.
 * @param launcher - Optional browser launcher. Defaults to Puppeteer's launch().
 * @returns The page renderer.
 */
export function createBrowserRenderer(config: BrowserConfig, launcher: BrowserLauncher = puppeteerLaunch): PageRenderer {

  return {

    openSession: async (): Promise<RenderSession> => openBrowserSession(config, launcher)
  };
}
