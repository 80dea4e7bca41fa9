import { describe, expect, it } from "vitest";
import { detectBrowser, isItpAffected, shouldSetTestCookie } from "../src/itp";
import { UA } from "./helpers";

describe("detectBrowser", () => {
  it("should detect desktop Safari and its major version", () => {
    expect(detectBrowser(UA.safari17)).toEqual({ name: "safari", majorVersion: 17, ios: false });
  });

  it("should detect Chromium-based browsers before Chrome", () => {
    expect(detectBrowser(UA.edge).name).toBe("edge");
    expect(detectBrowser(UA.samsung)).toEqual({ name: "samsung", majorVersion: 23, ios: false });
    expect(detectBrowser(UA.chrome)).toEqual({ name: "chrome", majorVersion: 118, ios: false });
  });

  it("should detect Chrome on iOS as an iOS browser", () => {
    expect(detectBrowser(UA.iosChrome)).toEqual({ name: "chrome", majorVersion: 118, ios: true });
  });

  it("should report unknown user agents", () => {
    expect(detectBrowser("curl/8.4.0")).toEqual({ name: "unknown", majorVersion: null, ios: false });
    expect(detectBrowser(undefined).name).toBe("unknown");
  });
});

describe("isItpAffected", () => {
  it("should flag Safari 11 and later", () => {
    expect(isItpAffected(UA.safari17)).toBe(true);
    expect(isItpAffected(UA.safari10)).toBe(false);
  });

  it("should flag every browser on iOS", () => {
    expect(isItpAffected(UA.iosSafari)).toBe(true);
    expect(isItpAffected(UA.iosChrome)).toBe(true);
  });

  it("should not flag Chromium or Firefox on desktop and Android", () => {
    expect(isItpAffected(UA.chrome)).toBe(false);
    expect(isItpAffected(UA.edge)).toBe(false);
    expect(isItpAffected(UA.firefox)).toBe(false);
    expect(isItpAffected(UA.androidChrome)).toBe(false);
  });

  it("should not flag a missing user agent", () => {
    expect(isItpAffected(undefined)).toBe(false);
    expect(isItpAffected("")).toBe(false);
  });
});

describe("shouldSetTestCookie", () => {
  it("should only set the test cookie for embedded apps on ITP browsers", () => {
    expect(shouldSetTestCookie(UA.safari17, true)).toBe(true);
    expect(shouldSetTestCookie(UA.safari17, false)).toBe(false);
    expect(shouldSetTestCookie(UA.chrome, true)).toBe(false);
  });
});
