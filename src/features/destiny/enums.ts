/**
 * Ghostline — src/features/destiny/enums.ts
 * Bungie.net numeric enums we render or store, mapped to display names.
 * DOCS: https://bungie-net.github.io/multi/schema_BungieMembershipType.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const MembershipType = {
  None: 0,
  Xbox: 1,
  Psn: 2,
  Steam: 3,
  Blizzard: 4,
  Stadia: 5,
  Egs: 6,
  Bungie: 254,
  All: -1,
} as const;

export type MembershipTypeName = Exclude<keyof typeof MembershipType, "None" | "All">;
export type MembershipTypeValue = (typeof MembershipType)[keyof typeof MembershipType];

export const MEMBERSHIP_TYPE_NAMES: readonly MembershipTypeName[] = [
  "Xbox",
  "Psn",
  "Steam",
  "Blizzard",
  "Stadia",
  "Egs",
  "Bungie",
];

export function isMembershipTypeName(value: string): value is MembershipTypeName {
  return MEMBERSHIP_TYPE_NAMES.some((name) => name === value);
}

/** 3 → "Steam"; unknown platforms return null. */
export function membershipTypeName(value: number): MembershipTypeName | null {
  return MEMBERSHIP_TYPE_NAMES.find((name) => MembershipType[name] === value) ?? null;
}

export function membershipTypeValue(name: MembershipTypeName): number {
  return MembershipType[name];
}

export const CLASS_NAMES: Record<number, string> = { 0: "Titan", 1: "Hunter", 2: "Warlock" };
export const RACE_NAMES: Record<number, string> = { 0: "Human", 1: "Awoken", 2: "Exo" };
export const GENDER_NAMES: Record<number, string> = { 0: "Male", 1: "Female" };

/**
 * Character stat hashes in display order. A tuple list, not an object: hash keys
 * are integer-like, so object iteration would sort them numerically.
 */
export const CHARACTER_STATS: readonly (readonly [hash: string, label: string])[] = [
  ["1935470627", "Power"],
  ["2996146975", "Mobility"],
  ["392767087", "Resilience"],
  ["1943323491", "Recovery"],
  ["1735777505", "Discipline"],
  ["144602215", "Intellect"],
  ["4244567218", "Strength"],
];

/** DestinyActivityModeType values that show up on post-game reports. */
export const ACTIVITY_MODE_NAMES: Record<number, string> = {
  2: "Story",
  3: "Strike",
  4: "Raid",
  5: "Crucible",
  6: "Patrol",
  18: "Strike",
  19: "Iron Banner",
  46: "Nightfall",
  63: "Gambit",
  82: "Dungeon",
  84: "Trials of Osiris",
};

/** Definitions the Armory search accepts. */
export const ENTITY_DEFINITIONS: readonly (readonly [definition: string, label: string])[] = [
  ["DestinyInventoryItemDefinition", "Item"],
  ["DestinyActivityDefinition", "Activity"],
  ["DestinyDestinationDefinition", "Destination"],
  ["DestinyVendorDefinition", "Vendor"],
  ["DestinyRecordDefinition", "Triumph"],
  ["DestinyCollectibleDefinition", "Collectible"],
];
