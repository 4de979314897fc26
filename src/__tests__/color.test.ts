import { describe, it, expect } from "vitest";
import { isDark, mixColor, normalizeHex } from "../theme/color.js";

describe("normalizeHex", () => {
  it("lowercases #rrggbb", () => {
    expect(normalizeHex("#AABBCC")).toBe("#aabbcc");
  });

  it("drops the alpha channel of #rrggbbaa", () => {
    expect(normalizeHex("#aabbccdd")).toBe("#aabbcc");
  });

  it("expands #rgb", () => {
    expect(normalizeHex("#abc")).toBe("#aabbcc");
  });

  it("accepts 0x and X11 rgb: forms", () => {
    expect(normalizeHex("0x112233")).toBe("#112233");
    expect(normalizeHex("rgb:aa/bb/cc")).toBe("#aabbcc");
  });

  it("strips surrounding quotes and whitespace", () => {
    expect(normalizeHex("  '#101010' ")).toBe("#101010");
    expect(normalizeHex('"#202020"')).toBe("#202020");
  });

  it("only accepts bare hex when asked to", () => {
    expect(normalizeHex("aabbcc")).toBeNull();
    expect(normalizeHex("aabbcc", { allowBare: true })).toBe("#aabbcc");
  });

  it("rejects names, empty strings and garbage", () => {
    expect(normalizeHex("red")).toBeNull();
    expect(normalizeHex("")).toBeNull();
    expect(normalizeHex(undefined)).toBeNull();
    expect(normalizeHex("#12345")).toBeNull();
  });
});

describe("mixColor", () => {
  it("returns the endpoints at t=0 and t=1", () => {
    expect(mixColor("#102030", "#f0e0d0", 0)).toBe("#102030");
    expect(mixColor("#102030", "#f0e0d0", 1)).toBe("#f0e0d0");
  });

  it("blends linearly", () => {
    expect(mixColor("#000000", "#ffffff", 0.5)).toBe("#808080");
    expect(mixColor("#000000", "#ffffff", 0.15)).toBe("#262626");
  });
});

describe("isDark", () => {
  it("classifies by luminance", () => {
    expect(isDark("#1e1e1e")).toBe(true);
    expect(isDark("#ffffff")).toBe(false);
    expect(isDark("#fdf6e3")).toBe(false);
  });
});
