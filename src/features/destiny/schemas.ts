/**
 * Ghostline — src/features/destiny/schemas.ts
 * WHAT: zod schemas for the slices of Bungie.net responses we read.
 * WHY: The platform changes shapes between seasons; validate at the edge instead of trusting casts.
 * DOCS:
 *  - https://bungie-net.github.io/multi/index.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";

/** Standard platform envelope; `Response` is validated separately per endpoint. */
export const envelopeSchema = z.object({
  Response: z.unknown().optional(),
  ErrorCode: z.number(),
  ErrorStatus: z.string(),
  Message: z.string().default(""),
  ThrottleSeconds: z.number().optional(),
});

export const userInfoCardSchema = z.object({
  membershipId: z.string(),
  membershipType: z.number(),
  displayName: z.string().default(""),
  bungieGlobalDisplayName: z.string().default(""),
  bungieGlobalDisplayNameCode: z.number().optional(),
  iconPath: z.string().optional(),
  crossSaveOverride: z.number().optional(),
});
export type UserInfoCard = z.infer<typeof userInfoCardSchema>;

export const membershipsSchema = z.object({
  destinyMemberships: z.array(userInfoCardSchema),
  primaryMembershipId: z.string().optional(),
  bungieNetUser: z.object({
    membershipId: z.string(),
    uniqueName: z.string().optional(),
    displayName: z.string().optional(),
    about: z.string().optional(),
    profilePicturePath: z.string().optional(),
    firstAccess: z.string().optional(),
  }),
});
export type MembershipsForCurrentUser = z.infer<typeof membershipsSchema>;

export const playerSearchSchema = z.array(userInfoCardSchema);

export const globalNameSearchSchema = z.object({
  searchResults: z.array(
    z.object({
      bungieGlobalDisplayName: z.string(),
      bungieGlobalDisplayNameCode: z.number().optional(),
      bungieNetMembershipId: z.string().optional(),
      destinyMemberships: z.array(userInfoCardSchema).default([]),
    })
  ),
  page: z.number(),
  hasMore: z.boolean(),
});
export type GlobalNameSearchPage = z.infer<typeof globalNameSearchSchema>;

export const characterSchema = z.object({
  characterId: z.string(),
  membershipId: z.string(),
  membershipType: z.number(),
  dateLastPlayed: z.string(),
  // int64 fields arrive as strings
  minutesPlayedTotal: z.coerce.number(),
  light: z.number(),
  stats: z.record(z.number()).default({}),
  raceType: z.number(),
  classType: z.number(),
  genderType: z.number(),
  emblemPath: z.string().optional(),
  emblemBackgroundPath: z.string().optional(),
});
export type Character = z.infer<typeof characterSchema>;

export const profileCharactersSchema = z.object({
  characters: z
    .object({
      data: z.record(characterSchema).optional(),
    })
    .optional(),
});

export const groupSchema = z.object({
  detail: z.object({
    groupId: z.string(),
    name: z.string(),
    about: z.string().default(""),
    motto: z.string().default(""),
    memberCount: z.number(),
    creationDate: z.string(),
    isPublic: z.boolean().optional(),
    clanInfo: z.object({ clanCallsign: z.string() }).optional(),
  }),
  founder: z
    .object({
      destinyUserInfo: userInfoCardSchema,
    })
    .optional(),
});
export type Group = z.infer<typeof groupSchema>;

export const displayPropertiesSchema = z.object({
  name: z.string().default(""),
  description: z.string().default(""),
  icon: z.string().optional(),
  hasIcon: z.boolean().default(false),
});
export type DisplayProperties = z.infer<typeof displayPropertiesSchema>;

export const inventoryItemSchema = z.object({
  hash: z.number(),
  displayProperties: displayPropertiesSchema,
  flavorText: z.string().optional(),
  itemTypeAndTierDisplayName: z.string().optional(),
  screenshot: z.string().optional(),
});
export type InventoryItem = z.infer<typeof inventoryItemSchema>;

/** Destiny2.SearchDestinyEntities */
export const entitySearchSchema = z.object({
  suggestedWords: z.array(z.string()).default([]),
  results: z.object({
    results: z
      .array(
        z.object({
          hash: z.number(),
          entityType: z.string(),
          displayProperties: displayPropertiesSchema,
          weight: z.number().optional(),
        })
      )
      .default([]),
    totalResults: z.number().default(0),
    hasMore: z.boolean().default(false),
  }),
});
export type EntitySearchResult = z.infer<typeof entitySearchSchema>;

export const friendSchema = z.object({
  lastSeenAsMembershipId: z.string(),
  lastSeenAsBungieMembershipType: z.number().optional(),
  bungieGlobalDisplayName: z.string().default(""),
  bungieGlobalDisplayNameCode: z.number().optional(),
  /** 0 offline, 1 online */
  onlineStatus: z.number(),
  bungieNetUser: z
    .object({
      uniqueName: z.string().optional(),
      displayName: z.string().optional(),
    })
    .optional(),
});
export type Friend = z.infer<typeof friendSchema>;

export const friendListSchema = z.object({
  friends: z.array(friendSchema).default([]),
});

export const friendRequestsSchema = z.object({
  incomingRequestList: z.array(friendSchema).default([]),
  outgoingRequestList: z.array(friendSchema).default([]),
});
export type FriendRequests = z.infer<typeof friendRequestsSchema>;

const historicalStatSchema = z.object({
  basic: z.object({
    value: z.number(),
    displayValue: z.string().default(""),
  }),
});

/** Destiny2.GetPostGameCarnageReport */
export const postGameReportSchema = z.object({
  period: z.string(),
  startingPhaseIndex: z.number().optional(),
  activityDetails: z.object({
    referenceId: z.number(),
    instanceId: z.string(),
    mode: z.number(),
    membershipType: z.number(),
  }),
  entries: z
    .array(
      z.object({
        characterId: z.string(),
        player: z.object({
          destinyUserInfo: userInfoCardSchema,
          characterClass: z.string().optional(),
          lightLevel: z.number().optional(),
        }),
        values: z.record(historicalStatSchema).default({}),
      })
    )
    .default([]),
});
export type PostGameReport = z.infer<typeof postGameReportSchema>;
export type PostGameEntry = PostGameReport["entries"][number];

export const activityDefinitionSchema = z.object({
  hash: z.number(),
  displayProperties: displayPropertiesSchema,
  pgcrImage: z.string().optional(),
});
export type ActivityDefinition = z.infer<typeof activityDefinitionSchema>;

/** OAuth2 token endpoint; not wrapped in the platform envelope. */
export const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
  refresh_token: z.string(),
  refresh_expires_in: z.number(),
  membership_id: z.string(),
});

export const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
