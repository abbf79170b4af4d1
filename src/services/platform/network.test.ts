/**
 * Tests for the network layer implementation.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { DefaultNetworkLayer, type HttpClient } from "./network.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

function createHangingFetch(onAbort: () => void) {
  return async (_url: string | URL | Request, init?: RequestInit): Promise<Response> =>
    new Promise<Response>((_, reject) => {
      init?.signal?.addEventListener("abort", () => {
        onAbort();
        reject(new DOMException("Aborted", "AbortError"));
      });
    });
}

describe("DefaultNetworkLayer", () => {
  describe("HttpClient.fetch()", () => {
    let networkLayer: HttpClient;

    beforeEach(() => {
      networkLayer = new DefaultNetworkLayer(createSilentLogger());
    });

    it("returns response on success", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("ok", { status: 200 }));

      const response = await networkLayer.fetch("https://example.test/releases");

      expect(response.status).toBe(200);
      expect(await response.text()).toBe("ok");
    });

    it("resolves non-2xx responses instead of throwing", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("", { status: 404 }));

      const response = await networkLayer.fetch("https://example.test/missing");

      expect(response.ok).toBe(false);
      expect(response.status).toBe(404);
    });

    it("merges default headers with per-request headers", async () => {
      const fetchSpy = vi
        .spyOn(globalThis, "fetch")
        .mockResolvedValueOnce(new Response("ok", { status: 200 }));
      const layer = new DefaultNetworkLayer(createSilentLogger(), {
        defaultHeaders: { "User-Agent": "chv", Accept: "*/*" },
      });

      await layer.fetch("https://example.test/releases", {
        headers: { Accept: "application/vnd.github+json" },
      });

      expect(fetchSpy).toHaveBeenCalledWith(
        "https://example.test/releases",
        expect.objectContaining({
          headers: { "User-Agent": "chv", Accept: "application/vnd.github+json" },
        })
      );
    });

    it("aborts after the specified timeout", async () => {
      let abortTriggered = false;
      vi.spyOn(globalThis, "fetch").mockImplementation(
        createHangingFetch(() => {
          abortTriggered = true;
        })
      );

      await expect(
        networkLayer.fetch("https://example.test/slow", { timeout: 20 })
      ).rejects.toThrow();
      expect(abortTriggered).toBe(true);
    });

    it("uses the configured default timeout", async () => {
      let abortTriggered = false;
      vi.spyOn(globalThis, "fetch").mockImplementation(
        createHangingFetch(() => {
          abortTriggered = true;
        })
      );
      const layer = new DefaultNetworkLayer(createSilentLogger(), { defaultTimeout: 20 });

      await expect(layer.fetch("https://example.test/slow")).rejects.toThrow();
      expect(abortTriggered).toBe(true);
    });

    it("aborts when external signal is aborted", async () => {
      const controller = new AbortController();
      vi.spyOn(globalThis, "fetch").mockImplementation(createHangingFetch(() => {}));

      const resultPromise = networkLayer.fetch("https://example.test/slow", {
        signal: controller.signal,
      });
      controller.abort();

      await expect(resultPromise).rejects.toThrow("Aborted");
    });

    it("aborts immediately when signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      vi.spyOn(globalThis, "fetch").mockImplementation(async (_url, init) => {
        if (init?.signal?.aborted) {
          throw new DOMException("Aborted", "AbortError");
        }
        return new Response("ok", { status: 200 });
      });

      await expect(
        networkLayer.fetch("https://example.test/releases", { signal: controller.signal })
      ).rejects.toThrow("Aborted");
    });

    it("clears timeout on error", async () => {
      const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout");
      vi.spyOn(globalThis, "fetch").mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(networkLayer.fetch("https://example.test/releases")).rejects.toThrow(
        "fetch failed"
      );
      expect(clearTimeoutSpy).toHaveBeenCalled();
    });
  });
});
