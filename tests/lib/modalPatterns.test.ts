/**
 * Ghostline — tests/lib/modalPatterns.test.ts
 * WHAT: Component custom IDs round-trip through the router.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  destinySyncButtonId,
  destinySyncModalId,
  identifyComponentRoute,
} from "../../src/lib/modalPatterns.js";

const USER_ID = "200000000000000001";

describe("identifyComponentRoute", () => {
  it("routes the sync button to its owner", () => {
    expect(destinySyncButtonId(USER_ID)).toBe(`v1:destiny:sync:enter:user${USER_ID}`);
    expect(identifyComponentRoute(destinySyncButtonId(USER_ID))).toEqual({
      type: "destiny_sync_button",
      userId: USER_ID,
    });
  });

  it("routes the sync modal to its owner", () => {
    expect(identifyComponentRoute(destinySyncModalId(USER_ID))).toEqual({
      type: "destiny_sync_modal",
      userId: USER_ID,
    });
  });

  it.each(["", "v1:destiny:sync:enter:user", "v1:destiny:sync:enter:userabc", "v2:modal:destiny:sync:user1"])(
    "returns null for %j",
    (id) => {
      expect(identifyComponentRoute(id)).toBeNull();
    }
  );

  it("keeps IDs under Discord's 100 character limit", () => {
    expect(destinySyncModalId("99999999999999999999").length).toBeLessThanOrEqual(100);
  });
});
