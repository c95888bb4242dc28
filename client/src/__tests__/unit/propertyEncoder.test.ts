/**
 * Unit tests for the property encoder
 */

import { describe, it, expect } from "vitest";
import { encodeProperties, hasPropertyKey } from "../../modules/propertyEncoder";
import { createMockLogger } from "../helpers/mockLogger";

function segmentsOf(encoded: string): string[] {
  return encoded.split("&").filter((segment) => segment.length > 0).sort();
}

describe("encodeProperties", () => {
  it("should return an empty string for absent or empty maps", () => {
    expect(encodeProperties(undefined)).toBe("");
    expect(encodeProperties(null)).toBe("");
    expect(encodeProperties({})).toBe("");
    expect(encodeProperties(new Map())).toBe("");
  });

  it("should drop an empty key and an empty value but keep valid entries", () => {
    const logger = createMockLogger();

    expect(encodeProperties({ "": "v", k: "", ok: "yes" }, { logger })).toBe("&ok=yes");
    expect(logger.logWarn).toHaveBeenCalledTimes(2);
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Property keys must not be empty strings. Dropping property."
    );
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Property values must not be null or empty strings. Dropping property.",
      { key: "k" }
    );
  });

  it("should drop null and undefined values", () => {
    const encoded = encodeProperties({ a: null, b: undefined, c: "1" });
    expect(encoded).toBe("&c=1");
  });

  it("should emit every valid entry exactly once", () => {
    const encoded = encodeProperties({ color: "blue", size: "XL", "item name": "red shoe" });

    expect(segmentsOf(encoded)).toEqual(["color=blue", "item%20name=red%20shoe", "size=XL"]);
  });

  it("should accept a Map", () => {
    const properties = new Map<string, string | null>([
      ["plan", "pro"],
      ["", "dropped"],
      ["seats", "5"],
    ]);

    expect(segmentsOf(encodeProperties(properties))).toEqual(["plan=pro", "seats=5"]);
  });

  it("should keep a key whose encoded length is exactly 255", () => {
    const key = " ".repeat(85); // 85 * "%20"
    expect(encodeProperties({ [key]: "v" })).toBe(`&${"%20".repeat(85)}=v`);
  });

  it("should drop a key whose encoded length exceeds 255", () => {
    const logger = createMockLogger();
    const key = " ".repeat(86);

    expect(encodeProperties({ [key]: "v", ok: "1" }, { logger })).toBe("&ok=1");
    expect(logger.logWarn).toHaveBeenCalledTimes(1);
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Property key cannot be longer than 255 characters. " +
        "When URL escaped, your key is 258 characters long " +
        `(the submitted value is ${key}, the URL escaped value is ${"%20".repeat(86)}). Dropping property.`
    );
  });

  it("should measure the key length after encoding, not before", () => {
    const shortRaw = "é".repeat(50); // 300 encoded characters
    const longRawAscii = "a".repeat(255);

    expect(encodeProperties({ [shortRaw]: "v" })).toBe("");
    expect(encodeProperties({ [longRawAscii]: "v" })).toBe(`&${longRawAscii}=v`);
  });

  it("should check the value before encoding", () => {
    const encode = (value: string) => (value === "raw" ? "" : value);
    expect(encodeProperties({ k: "raw" }, { encode })).toBe("&k=");
  });

  it("should escape broken surrogates in keys and values instead of dropping them", () => {
    const encoded = encodeProperties({ "\uD83D": "v", "emoji\uD83D": "x\uD83D" });

    expect(segmentsOf(encoded)).toEqual(["%3F=v", "emoji%3F=x%3F"]);
  });

  it("should drop a key that encodes to an empty string", () => {
    const logger = createMockLogger();
    const encode = (value: string) => (value === "bad" ? "" : value);

    expect(encodeProperties({ bad: "1", ok: "2" }, { encode, logger })).toBe("&ok=2");
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Property key could not be URL escaped. Dropping property.",
      { key: "bad" }
    );
  });

  it("should pass _d and _t through like any other key", () => {
    expect(encodeProperties({ _d: "1", _t: "500" })).toBe("&_d=1&_t=500");
  });

  it("should use a custom encode function when given", () => {
    const encoded = encodeProperties({ a: "b" }, { encode: (value) => value.toUpperCase() });
    expect(encoded).toBe("&A=B");
  });
});

describe("hasPropertyKey", () => {
  it("should check own keys of a record only", () => {
    expect(hasPropertyKey({ _d: "1" }, "_d")).toBe(true);
    expect(hasPropertyKey({}, "toString")).toBe(false);
  });

  it("should count a key with an absent value as present", () => {
    expect(hasPropertyKey({ _t: undefined }, "_t")).toBe(true);
    expect(hasPropertyKey(new Map([["_t", null]]), "_t")).toBe(true);
  });
});
