/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * checker.ts: Single liveness check attempt for pagepulse.
 */
import type { AttemptResult, PageRenderer, RenderSession } from "../types/index.js";
import { LOG, RenderError, formatError, startTimer } from "../utils/index.js";

/**
 * Tests whether the rendered document contains the marker. The match is an exact, case-sensitive substring search with no whitespace or entity normalization.
 * @param documentText - The rendered document.
 * @param expectedText - The marker.
 * @returns True if the marker occurs in the document.
 */
export function containsMarker(documentText: string, expectedText: string): boolean {

  return documentText.includes(expectedText);
}

/**
 * Runs one check attempt: acquires a rendering session, loads the URL, searches the document for the marker, and releases the session. Once acquired, the session
 * is closed exactly once no matter how the attempt ends. This function never rejects; every failure comes back as an "errored" result.
 * @param renderer - The rendering capability.
 * @param url - The page to load.
 * @param expectedText - The marker that means the page is alive.
 * @returns The attempt result.
 */
export async function checkLiveness(renderer: PageRenderer, url: string, expectedText: string): Promise<AttemptResult> {

  const elapsed = startTimer();
  let session: RenderSession;

  try {

    session = await renderer.openSession();
  } catch(error) {

    return { error: RenderError.from(error, "Failed to open a rendering session"), status: "errored" };
  }

  try {

    const documentText = await session.open(url);
    const alive = containsMarker(documentText, expectedText);

    LOG.debug("check", "Marker %s in %s characters of rendered document after %sms.", alive ? "found" : "not found", documentText.length, elapsed());

    return alive ? { status: "alive" } : { status: "not-alive" };
  } catch(error) {

    return { error: RenderError.from(error, "Rendering failed"), status: "errored" };
  } finally {

    try {

      await session.close();
    } catch(closeError) {

      LOG.warn("Failed to release the rendering session: %s.", formatError(closeError));
    }
  }
}
