import { LOG, RenderError } from "../src/utils/index.js";
import { checkLiveness, containsMarker } from "../src/monitor/checker.js";
import { describe, expect, it, vi } from "vitest";
import { createScriptedRenderer } from "./helpers/fakes.js";

describe("monitor/checker", () => {

  describe("containsMarker", () => {

    it("matches an exact substring", () => {

      expect(containsMarker("<div>Status: I'm alive</div>", "I'm alive")).toBe(true);
    });

    it("is case-sensitive", () => {

      expect(containsMarker("<div>i'm ALIVE</div>", "I'm alive")).toBe(false);
    });

    it("does not normalize whitespace or entities", () => {

      expect(containsMarker("<div>I'm  alive</div>", "I'm alive")).toBe(false);
      expect(containsMarker("<div>I&#39;m alive</div>", "I'm alive")).toBe(false);
    });
  });

  describe("checkLiveness", () => {

    it("reports alive and releases the session", async () => {

      const renderer = createScriptedRenderer([{ document: "<main>ok: I'm alive</main>" }]);

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result).toEqual({ status: "alive" });
      expect(renderer.urls).toEqual(["https://app.example.com/"]);
      expect(renderer.closed).toBe(1);
    });

    it("reports not-alive when the marker is absent", async () => {

      const renderer = createScriptedRenderer([{ document: "<main>Maintenance</main>" }]);

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result).toEqual({ status: "not-alive" });
      expect(renderer.closed).toBe(1);
    });

    it("reports a navigation failure as errored and still releases the session", async () => {

      const renderer = createScriptedRenderer([{ openError: new Error("net::ERR_NAME_NOT_RESOLVED") }]);

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result.status).toBe("errored");

      if(result.status !== "errored") {

        return;
      }

      expect(result.error).toBeInstanceOf(RenderError);
      expect(result.error.message).toBe("Rendering failed: net::ERR_NAME_NOT_RESOLVED");
      expect(renderer.closed).toBe(1);
    });

    it("keeps the message of a RenderError thrown by the session", async () => {

      const original = new RenderError("Failed to load https://app.example.com/: timeout");
      const renderer = createScriptedRenderer([{ openError: original }]);

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result).toEqual({ error: original, status: "errored" });
    });

    it("does not close a session it never acquired", async () => {

      const renderer = createScriptedRenderer([{ acquireError: new Error("spawn ENOENT") }]);

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result.status).toBe("errored");

      if(result.status !== "errored") {

        return;
      }

      expect(result.error.message).toBe("Failed to open a rendering session: spawn ENOENT");
      expect(renderer.opened).toBe(0);
      expect(renderer.closed).toBe(0);
    });

    it("logs a failed release without changing the result", async () => {

      const warn = vi.spyOn(LOG, "warn");
      const renderer = createScriptedRenderer([{ document: "I'm alive" }]);

      renderer.closeError = new Error("Target closed.");

      const result = await checkLiveness(renderer, "https://app.example.com/", "I'm alive");

      expect(result).toEqual({ status: "alive" });
      expect(renderer.closed).toBe(1);
      expect(warn).toHaveBeenCalledWith("Failed to release the rendering session: %s.", "Target closed");
    });
  });
});
