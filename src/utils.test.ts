import { describe, it, expect, vi, afterEach } from "vitest";
import {
  clamp01,
  createConsoleLogger,
  foldText,
  mean,
  median,
  roundMetric,
  splitWords,
  stdDev,
} from "./utils.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  // ── Prefixes ─────────────────────────────────────────────────────────────

  it("prefixes info lines with level and component", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger("Scorer").info("ready", 3);
    expect(spy).toHaveBeenCalledWith("[INFO] [Scorer] ready", 3);
  });

  it("routes warnings to console.warn", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger("Scorer").warn("slow model");
    expect(spy).toHaveBeenCalledWith("[WARN] [Scorer] slow model");
  });

  it("routes errors to console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("Server").error("boom");
    expect(spy).toHaveBeenCalledWith("[ERROR] [Server] boom");
  });
});

describe("foldText", () => {
  it("lowercases and strips accents", () => {
    expect(foldText("Parálisis Cerebral")).toBe("paralisis cerebral");
  });

  it("folds ñ to n", () => {
    expect(foldText("NIÑO")).toBe("nino");
  });

  it("leaves plain ASCII lowercase text untouched", () => {
    expect(foldText("tdah")).toBe("tdah");
  });
});

describe("splitWords", () => {
  it("returns an empty array for empty or blank text", () => {
    expect(splitWords("")).toEqual([]);
    expect(splitWords("   \n\t ")).toEqual([]);
  });

  it("splits on any run of whitespace", () => {
    expect(splitWords("  quiero   agua\nmama ")).toEqual(["quiero", "agua", "mama"]);
  });
});

describe("number helpers", () => {
  // ── roundMetric / clamp01 ────────────────────────────────────────────────

  it("rounds to four decimals by default", () => {
    expect(roundMetric(0.123456)).toBe(0.1235);
  });

  it("rounds to the requested precision", () => {
    expect(roundMetric(2.345, 1)).toBe(2.3);
  });

  it("clamps values into [0, 1]", () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
    expect(clamp01(1.5)).toBe(1);
  });

  // ── mean / median / stdDev ───────────────────────────────────────────────

  it("returns 0 for empty inputs", () => {
    expect(mean([])).toBe(0);
    expect(median([])).toBe(0);
    expect(stdDev([])).toBe(0);
  });

  it("computes the mean", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
  });

  it("takes the middle value of an odd-length list", () => {
    expect(median([9, 1, 5])).toBe(5);
  });

  it("averages the two middle values of an even-length list", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("does not reorder the caller's array", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it("computes the population standard deviation", () => {
    expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });
});
