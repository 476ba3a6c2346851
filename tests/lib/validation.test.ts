/**
 * Ghostline — tests/lib/validation.test.ts
 * WHAT: Length and whitespace checks on user text.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { requireLength, requireSingleToken, ValidationError } from "../../src/lib/validation.js";
import { validatePrefix } from "../../src/config/prefixStore.js";

describe("requireLength", () => {
  it("returns the trimmed value", () => {
    expect(requireLength("  hi  ", "Name", 5)).toBe("hi");
  });

  it("rejects blank input", () => {
    expect(() => requireLength("   ", "Note name", 32)).toThrow("Note name cannot be empty");
  });

  it("throws ValidationError carrying the field", () => {
    let caught: unknown;
    try {
      requireLength("toolong", "Name", 3);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field: "Name", message: "Name cannot be longer than 3 characters" });
  });
});

describe("requireSingleToken", () => {
  it("passes values without whitespace through", () => {
    expect(requireSingleToken("!!", "Prefix")).toBe("!!");
  });

  it("rejects inner whitespace", () => {
    expect(() => requireSingleToken("a b", "Prefix")).toThrow("Prefix cannot contain spaces");
  });
});

describe("validatePrefix", () => {
  it("trims before checking", () => {
    expect(validatePrefix("  !  ")).toBe("!");
  });

  it.each([
    ["", "You must provide a prefix."],
    ["toolong", "Prefix length cannot be more than 5"],
    ["a b", "Prefix cannot contain spaces"],
  ])("rejects %j", (raw, message) => {
    expect(() => validatePrefix(raw)).toThrow(message);
  });
});
