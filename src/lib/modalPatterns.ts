/**
 * Ghostline — src/lib/modalPatterns.ts
 * WHAT: Custom ID formats and router for our buttons and modals.
 * WHY: Discord has no built-in routing for components; IDs must be parseable.
 * FLOWS:
 *  - IDs use v1: prefix + route segments + the user the component belongs to.
 *
 * ID format examples:
 *  - v1:destiny:sync:enter:user123 → button that opens the sync modal
 *  - v1:modal:destiny:sync:user123 → the sync modal itself
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Discord custom IDs are limited to 100 chars. Convention:
 *   v1:<type>:<action>:<params>
 * The "v1:" prefix leaves room for format changes without breaking old buttons.
 */

export const BTN_DESTINY_SYNC_RE = /^v1:destiny:sync:enter:user(\d+)$/;
export const MODAL_DESTINY_SYNC_RE = /^v1:modal:destiny:sync:user(\d+)$/;

/** Text input inside the sync modal. */
export const DESTINY_SYNC_FIELD_ID = "code_or_url";

export function destinySyncButtonId(userId: string): string {
  return `v1:destiny:sync:enter:user${userId}`;
}

export function destinySyncModalId(userId: string): string {
  return `v1:modal:destiny:sync:user${userId}`;
}

export type ComponentRoute =
  | { type: "destiny_sync_button"; userId: string }
  | { type: "destiny_sync_modal"; userId: string };

/**
 * @returns null for IDs that match no known pattern; the caller answers "unhandled"
 */
export function identifyComponentRoute(id: string): ComponentRoute | null {
  const button = id.match(BTN_DESTINY_SYNC_RE);
  if (button) {
    return { type: "destiny_sync_button", userId: button[1] };
  }

  const modal = id.match(MODAL_DESTINY_SYNC_RE);
  if (modal) {
    return { type: "destiny_sync_modal", userId: modal[1] };
  }

  return null;
}
