import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "@deskrelay/shared";
import { ConfigError, parseNumberOption, resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  it("fills every default", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({
      session: { ttlMs: 7_200_000, sweepIntervalMs: 300_000, maxAuthFailures: 5 },
      capture: { fps: 15, quality: 70, maxWidth: 1920, pushFrames: false },
      input: { typingDelayMs: 10 },
      staffTokenTtl: "8h",
      signingKeyPath: ".deskrelay/keys/",
    });
  });

  it("keeps file values", () => {
    const config = resolveConfig({ capture: { fps: 5 }, session: { maxAuthFailures: 0 } }, {});

    expect(config.capture.fps).toBe(5);
    expect(config.capture.quality).toBe(70);
    expect(config.session.maxAuthFailures).toBe(0);
  });

  it("lets the environment override the file", () => {
    const config = resolveConfig(
      { capture: { fps: 5 } },
      { CAPTURE_FPS: "10", CAPTURE_QUALITY: "40", SESSION_TTL_MS: "60000" }
    );

    expect(config.capture.fps).toBe(10);
    expect(config.capture.quality).toBe(40);
    expect(config.session.ttlMs).toBe(60_000);
  });

  it("lets CLI options override the environment", () => {
    const config = resolveConfig(
      {},
      { CAPTURE_FPS: "10", SESSION_TTL_MS: "60000" },
      { fps: 20, sessionTtlMs: 1_000 }
    );

    expect(config.capture.fps).toBe(20);
    expect(config.session.ttlMs).toBe(1_000);
  });

  it("rejects out-of-range values", () => {
    expect(() => resolveConfig({ capture: { quality: 0 } }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({ capture: { quality: 0 } }, {})).toThrow(/capture\.quality/);
    expect(() => resolveConfig({}, {}, { fps: 100 })).toThrow(/capture\.fps/);
  });

  it("rejects non-numeric environment values", () => {
    expect(() => resolveConfig({}, { CAPTURE_FPS: "fast" })).toThrow(
      'CAPTURE_FPS must be a number, got "fast"'
    );
  });
});

describe("parseNumberOption", () => {
  it("parses numbers and passes undefined through", () => {
    expect(parseNumberOption("15", "--fps")).toBe(15);
    expect(parseNumberOption(undefined, "--fps")).toBeUndefined();
    expect(() => parseNumberOption("", "--fps")).toThrow(ConfigError);
  });
});
