import { describe, it, expect } from "vitest";
import { createJti, isUuidV4 } from "../src/token/jti.js";

describe("isUuidV4", () => {
  it.each([
    "9f0c6a8e-3b1d-4c2e-8a7f-5d6e4b3c2a10",
    "9F0C6A8E-3B1D-4C2E-BA7F-5D6E4B3C2A10",
  ])("accepts %s", (value) => {
    expect(isUuidV4(value)).toBe(true);
  });

  it.each([
    "abcd",
    "c232ab00-9414-11ec-b3c8-9f6bdeced846",
    "9f0c6a8e-3b1d-4c2e-ca7f-5d6e4b3c2a10",
    "9f0c6a8e3b1d4c2e8a7f5d6e4b3c2a10",
    "{9f0c6a8e-3b1d-4c2e-8a7f-5d6e4b3c2a10}",
  ])("rejects %s", (value) => {
    expect(isUuidV4(value)).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isUuidV4(42)).toBe(false);
    expect(isUuidV4(undefined)).toBe(false);
  });
});

describe("createJti", () => {
  it("creates distinct UUIDv4 values", () => {
    const a = createJti();
    const b = createJti();

    expect(isUuidV4(a)).toBe(true);
    expect(a).not.toBe(b);
  });
});
