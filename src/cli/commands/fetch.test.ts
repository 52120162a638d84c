import { describe, it, expect } from "vitest";
import { applyOverrides, parseFetchOptions, resolveLogLevel } from "./fetch";
import { loadDefaultConfig } from "../../utils/load-config";

describe("parseFetchOptions", () => {
  it("coerces numeric flags from strings", () => {
    expect(
      parseFetchOptions({ maxSize: "5", timeout: "2.5", concurrency: "3", retries: "0" }),
    ).toEqual({ maxSize: 5, timeout: 2.5, concurrency: 3, retries: 0 });
  });

  it("rejects out-of-range values", () => {
    expect(() => parseFetchOptions({ concurrency: "0" })).toThrow(
      "invalid options: --concurrency: Number must be greater than or equal to 1",
    );
  });

  it("rejects non-numeric values", () => {
    expect(() => parseFetchOptions({ maxSize: "big" })).toThrow("--maxSize");
  });
});

describe("applyOverrides", () => {
  it("lets flags win and leaves the rest alone", async () => {
    const config = await loadDefaultConfig();

    const merged = applyOverrides(config, { maxSize: 1, retries: 0, force: true });

    expect(merged.download).toMatchObject({ maxSize: 1, retries: 0, timeout: 15, concurrency: 5 });
    expect(merged.output.force).toBe(true);
    expect(config.download.maxSize).toBe(20);
  });
});

describe("resolveLogLevel", () => {
  it("prefers quiet, then debug, then verbose, then config", async () => {
    const config = await loadDefaultConfig();

    expect(resolveLogLevel({ quiet: true, debug: true }, config)).toBe("quiet");
    expect(resolveLogLevel({ debug: true, verbose: true }, config)).toBe("debug");
    expect(resolveLogLevel({ verbose: true }, config)).toBe("verbose");
    expect(resolveLogLevel({}, config)).toBe("normal");
  });
});
