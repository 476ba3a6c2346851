/**
 * Ghostline — tests/utils/discordMocks.ts
 * WHAT: Just enough of discord.js's users, members, guilds, messages and interactions
 * for the command handlers to run against. Each factory takes overrides for the fields a test cares about.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import { EmbedBuilder, type APIEmbed } from "discord.js";
import type {
  ChatInputCommandInteraction,
  Guild,
  GuildMember,
  TextChannel,
  User,
  Message,
  Role,
  ButtonInteraction,
  ModalSubmitInteraction,
  Client,
} from "discord.js";

// Snowflake-shaped ids so validators that check 17-20 digits accept them.
export const TEST_GUILD_ID = "100000000000000001";
export const TEST_USER_ID = "200000000000000001";
export const TEST_BOT_ID = "300000000000000001";

/**
 * Partial of a discord.js class without the toString/valueOf it overrides, which an
 * object literal's own Object.prototype members would otherwise clash with.
 */
type Overrides<T> = Partial<Omit<T, "toString" | "valueOf">>;

// ===== User Mocks =====

export function createMockUser(overrides: Overrides<User> = {}): User {
  const id = overrides.id ?? TEST_USER_ID;
  return {
    id,
    username: "testuser",
    discriminator: "0",
    tag: "testuser#0",
    bot: false,
    system: false,
    displayAvatarURL: vi.fn().mockReturnValue(`https://cdn.discordapp.com/avatars/${id}/abc.png`),
    send: vi.fn().mockResolvedValue(undefined),
    toString: vi.fn().mockReturnValue(`<@${id}>`),
    ...overrides,
  } as unknown as User;
}

// ===== Role Mocks =====

export function createMockRole(overrides: Overrides<Role> = {}): Role {
  return {
    id: "400000000000000001",
    name: "Muted",
    position: 1,
    managed: false,
    permissions: { has: vi.fn().mockReturnValue(false) },
    ...overrides,
  } as unknown as Role;
}

// ===== GuildMember Mocks =====

/**
 * The roles property is a RoleManager-like object whose add/remove keep the cache in step.
 */
export function createMockMember(overrides: Overrides<GuildMember> = {}): GuildMember {
  const user = createMockUser(overrides.user as Overrides<User> | undefined);
  const rolesCache = new Map<string, Role>();

  return {
    id: user.id,
    user,
    displayName: user.username,
    nickname: null,
    manageable: true,
    kickable: true,
    bannable: true,
    roles: {
      cache: rolesCache,
      highest: createMockRole({ position: 10 }),
      add: vi.fn().mockImplementation(async (roleId: string) => {
        rolesCache.set(roleId, createMockRole({ id: roleId }));
      }),
      remove: vi.fn().mockImplementation(async (roleId: string) => {
        rolesCache.delete(roleId);
      }),
    },
    permissions: {
      has: vi.fn().mockReturnValue(false),
    },
    send: vi.fn().mockResolvedValue(undefined),
    kick: vi.fn().mockResolvedValue(undefined),
    ban: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  } as unknown as GuildMember;
}

// ===== Channel Mocks =====

export function createMockChannel(overrides: Overrides<TextChannel> = {}): TextChannel {
  return {
    id: "500000000000000001",
    name: "test-channel",
    type: 0, // GuildText
    send: vi.fn().mockResolvedValue(undefined),
    isSendable: vi.fn().mockReturnValue(true),
    ...overrides,
  } as unknown as TextChannel;
}

// ===== Message Mocks =====

export function createMockMessage(overrides: Overrides<Message> = {}): Message {
  return {
    id: "600000000000000001",
    content: "Test message",
    author: createMockUser(),
    webhookId: null,
    guildId: TEST_GUILD_ID,
    channel: createMockChannel(),
    mentions: { users: new Map<string, User>() },
    client: createMockClient(),
    reply: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  } as unknown as Message;
}

// ===== Guild Mocks =====

/**
 * members.fetch rejects with Discord's Unknown Member (10007) for ids not in the cache,
 * which is what the real API does for users who left.
 */
export function createMockGuild(overrides: Overrides<Guild> = {}): Guild {
  const rolesCache = new Map<string, Role>();
  const membersCache = new Map<string, GuildMember>();

  return {
    id: TEST_GUILD_ID,
    name: "Test Guild",
    ownerId: "owner-123",
    roles: {
      cache: rolesCache,
      fetch: vi.fn().mockImplementation(async (id: string) => rolesCache.get(id) ?? null),
    },
    members: {
      cache: membersCache,
      me: createMockMember({ user: createMockUser({ id: TEST_BOT_ID, bot: true }) }),
      fetch: vi.fn().mockImplementation(async (id: string) => {
        const member = membersCache.get(id);
        if (!member) throw createDiscordAPIError(10007, "Unknown Member", 404);
        return member;
      }),
    },
    bans: {
      create: vi.fn().mockResolvedValue(undefined),
    },
    ...overrides,
  } as unknown as Guild;
}

// ===== Client Mocks =====

export function createMockClient(overrides: Overrides<Client> = {}): Client {
  const usersCache = new Map<string, User>();
  const guildsCache = new Map<string, Guild>();

  return {
    user: createMockUser({ id: TEST_BOT_ID, username: "TestBot", bot: true }),
    ws: { ping: 42 },
    users: {
      cache: usersCache,
      fetch: vi.fn().mockImplementation(async (id: string) => usersCache.get(id) ?? createMockUser({ id })),
    },
    guilds: {
      cache: guildsCache,
      fetch: vi.fn().mockImplementation(async (id: string) => {
        const guild = guildsCache.get(id);
        if (!guild) throw createDiscordAPIError(10004, "Unknown Guild", 404);
        return guild;
      }),
    },
    ...overrides,
  } as unknown as Client;
}

// ===== Interaction Mocks =====

type MockOptionsConfig = {
  getString?: Record<string, string | null>;
  getBoolean?: Record<string, boolean | null>;
  getInteger?: Record<string, number | null>;
  getRole?: Record<string, Role | null>;
  getUser?: Record<string, User | null>;
  getSubcommand?: string;
};

function createMockOptions(config: MockOptionsConfig = {}) {
  const lookup = <T>(table: Record<string, T | null> | undefined) =>
    vi.fn().mockImplementation((name: string, required?: boolean) => {
      const value = table?.[name] ?? null;
      if (required && value === null) throw new Error(`Missing required option: ${name}`);
      return value;
    });

  return {
    getString: lookup(config.getString),
    getBoolean: lookup(config.getBoolean),
    getInteger: lookup(config.getInteger),
    getRole: lookup(config.getRole),
    getUser: lookup(config.getUser),
    getSubcommand: vi.fn().mockReturnValue(config.getSubcommand ?? "default"),
  };
}

type InteractionKind = "slash" | "button" | "modal";

/**
 * reply/deferReply flip `replied`/`deferred` on the mock itself, so code that
 * branches on interaction state (replyOrEdit, ensureDeferred) sees real transitions.
 */
function responders() {
  return {
    deferred: false,
    replied: false,
    reply: vi.fn().mockImplementation(async function (this: { replied: boolean }) {
      this.replied = true;
    }),
    deferReply: vi.fn().mockImplementation(async function (this: { deferred: boolean }) {
      this.deferred = true;
    }),
    editReply: vi.fn().mockResolvedValue(undefined),
    followUp: vi.fn().mockResolvedValue(undefined),
    showModal: vi.fn().mockResolvedValue(undefined),
  };
}

function typeGuards(kind: InteractionKind) {
  return {
    isChatInputCommand: vi.fn().mockReturnValue(kind === "slash"),
    isButton: vi.fn().mockReturnValue(kind === "button"),
    isModalSubmit: vi.fn().mockReturnValue(kind === "modal"),
  };
}

/** Fields every interaction kind shares: caller, guild, channel, client and the response methods. */
function interactionBase(kind: InteractionKind, user: User, guild: Guild | null) {
  return {
    id: `${kind}-interaction-1`,
    user,
    guild,
    guildId: guild ? guild.id : null,
    channelId: "500000000000000001",
    client: createMockClient(),
    inGuild: vi.fn().mockReturnValue(guild !== null),
    ...responders(),
    ...typeGuards(kind),
  };
}

type InteractionExtras = {
  options?: MockOptionsConfig;
  /** Result of memberPermissions.has(); defaults to true */
  allowed?: boolean;
  /** Set false to model a DM */
  inGuild?: boolean;
};

/**
 * @example
 * const interaction = createMockInteraction({
 *   options: { getSubcommand: "set", getString: { prefix: "!" } },
 * });
 */
export function createMockInteraction(
  overrides: Overrides<Omit<ChatInputCommandInteraction, keyof InteractionExtras>> & InteractionExtras = {}
): ChatInputCommandInteraction {
  const { options: optionsConfig, allowed = true, inGuild = true, user: userOverride, guild: guildOverride, ...rest } =
    overrides;
  const user = createMockUser(userOverride);
  const guild = inGuild ? (guildOverride ?? createMockGuild()) : null;

  return {
    ...interactionBase("slash", user, guild),
    commandName: "test",
    member: inGuild ? createMockMember({ user }) : null,
    channel: createMockChannel(),
    memberPermissions: inGuild ? { has: vi.fn().mockReturnValue(allowed) } : null,
    options: createMockOptions(optionsConfig),
    ...rest,
  } as unknown as ChatInputCommandInteraction;
}

export function createMockButtonInteraction(overrides: Overrides<ButtonInteraction> = {}): ButtonInteraction {
  const { user: userOverride, guild: guildOverride, ...rest } = overrides;
  return {
    ...interactionBase("button", createMockUser(userOverride), guildOverride ?? createMockGuild()),
    customId: "v1:test:button",
    ...rest,
  } as unknown as ButtonInteraction;
}

/** `fields` maps text input custom ids to what the user typed; missing ids read as "". */
export function createMockModalInteraction(
  overrides: Overrides<Omit<ModalSubmitInteraction, "fields">> & { fields?: Record<string, string> } = {}
): ModalSubmitInteraction {
  const { fields: typed = {}, user: userOverride, guild: guildOverride, ...rest } = overrides;
  return {
    ...interactionBase("modal", createMockUser(userOverride), guildOverride ?? createMockGuild()),
    customId: "v1:test:modal",
    fields: {
      getTextInputValue: vi.fn().mockImplementation((name: string) => typed[name] ?? ""),
    },
    ...rest,
  } as unknown as ModalSubmitInteraction;
}

// ===== Discord Error Mocks =====

/**
 * Creates an error with the shape of a DiscordAPIError (name, numeric code, status).
 */
export function createDiscordAPIError(
  code: number,
  message: string,
  status = 400
): Error & { code: number; status: number } {
  const error = Object.assign(new Error(message), { code, status });
  error.name = "DiscordAPIError";
  return error;
}

// ===== Reply Inspection =====

/**
 * Embeds (as JSON) from the payload of a mocked reply/editReply/followUp call.
 */
export function embedsFromCall(fn: unknown, call = 0): APIEmbed[] {
  if (!vi.isMockFunction(fn)) throw new Error("expected a mock function");
  const payload: unknown = fn.mock.calls[call]?.[0];
  if (!payload || typeof payload !== "object" || !("embeds" in payload) || !Array.isArray(payload.embeds)) {
    throw new Error(`call ${call} has no embeds`);
  }
  return payload.embeds
    .filter((embed: unknown): embed is EmbedBuilder => embed instanceof EmbedBuilder)
    .map((embed: EmbedBuilder) => embed.toJSON());
}
