/**
 * Ghostline — src/commands/note.ts
 * WHAT: /note create|get|update|remove|list|purge.
 * WHY: Named text snippets members can save and recall. Names are global, not per guild.
 * FLOWS:
 *  - create → createNote → 👍 | ❌ name taken / invalid
 *  - remove → deleteNote (author, or Manage Messages)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  SlashCommandBuilder,
  EmbedBuilder,
  MessageFlags,
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
} from "discord.js";
import { withStep, type CommandContext } from "../lib/cmdWrap.js";
import { hasPermission } from "../lib/permissions.js";
import { toDiscordTimestamp } from "../lib/time.js";
import {
  NOTE_CONTENT_MAX,
  NOTE_NAME_MAX,
  NoteError,
  createNote,
  deleteAllNotesFor,
  deleteNote,
  getNote,
  listNotesFor,
  updateNote,
  type Note,
  type NoteUpdateResult,
} from "../store/notesStore.js";

export const OK_REACTION = "👍";
// Discord accepts at most 10 embeds per message
const MAX_NOTE_EMBEDS = 10;

export const data = new SlashCommandBuilder()
  .setName("note")
  .setDescription("Save and recall notes.")
  .addSubcommand((sc) =>
    sc
      .setName("create")
      .setDescription("Create a new note")
      .addStringOption((o) =>
        o.setName("name").setDescription("Note name").setRequired(true).setMaxLength(NOTE_NAME_MAX)
      )
      .addStringOption((o) =>
        o.setName("content").setDescription("Note content").setRequired(true).setMaxLength(NOTE_CONTENT_MAX)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("get")
      .setDescription("Show a note")
      .addStringOption((o) => o.setName("name").setDescription("Note name").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("update")
      .setDescription("Replace the content of a note you created")
      .addStringOption((o) => o.setName("name").setDescription("Note name").setRequired(true))
      .addStringOption((o) =>
        o.setName("content").setDescription("New content").setRequired(true).setMaxLength(NOTE_CONTENT_MAX)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("remove")
      .setDescription("Remove a note")
      .addStringOption((o) => o.setName("name").setDescription("Note name").setRequired(true))
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("List the notes you created"))
  .addSubcommand((sc) => sc.setName("purge").setDescription("Remove every note you created"));

export function buildNoteEmbed(note: Note): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(note.name)
    .setDescription(note.content)
    .addFields(
      { name: "Creator", value: `<@${note.authorId}>`, inline: true },
      { name: "Created", value: toDiscordTimestamp(note.createdAt, "f"), inline: true }
    )
    .setFooter({ text: `ID: ${note.id}` });
}

async function fail(interaction: ChatInputCommandInteraction, message: string): Promise<void> {
  await interaction.reply({ content: `❌ ${message}`, flags: MessageFlags.Ephemeral });
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const sub = interaction.options.getSubcommand();
  const actorId = interaction.user.id;

  switch (sub) {
    case "create": {
      const name = interaction.options.getString("name", true);
      const content = interaction.options.getString("content", true);
      try {
        await withStep(ctx, "db_write", () =>
          createNote({ name, content, authorId: actorId, guildId: interaction.guildId })
        );
      } catch (err) {
        if (err instanceof NoteError) {
          await fail(interaction, err.message);
          return;
        }
        throw err;
      }
      await interaction.reply({ content: OK_REACTION });
      return;
    }

    case "get": {
      const name = interaction.options.getString("name", true);
      const note = await withStep(ctx, "db_read", () => getNote(name));
      if (!note) {
        await interaction.reply({
          content: `No note named ${name.trim()}.`,
          flags: MessageFlags.Ephemeral,
          allowedMentions: { parse: [] },
        });
        return;
      }
      await interaction.reply({ embeds: [buildNoteEmbed(note)], allowedMentions: { parse: [] } });
      return;
    }

    case "update": {
      const name = interaction.options.getString("name", true);
      const content = interaction.options.getString("content", true);
      let result: NoteUpdateResult;
      try {
        result = await withStep(ctx, "db_write", () => updateNote(name, content, actorId));
      } catch (err) {
        if (err instanceof NoteError) {
          await fail(interaction, err.message);
          return;
        }
        throw err;
      }
      if (result === "not_found") {
        await fail(interaction, `No note named ${name.trim()}.`);
        return;
      }
      if (result === "not_author") {
        await fail(interaction, "You can only update notes you created.");
        return;
      }
      await interaction.reply({ content: OK_REACTION });
      return;
    }

    case "remove": {
      const name = interaction.options.getString("name", true);
      const moderatorOf =
        interaction.inGuild() && hasPermission(interaction, PermissionFlagsBits.ManageMessages) ? interaction.guildId : null;
      const result = await withStep(ctx, "db_write", () => deleteNote(name, actorId, { moderatorOf }));
      if (result === "not_found") {
        await fail(interaction, `No note named ${name.trim()}.`);
        return;
      }
      if (result === "not_author") {
        await fail(interaction, "You can only remove notes you created.");
        return;
      }
      await interaction.reply({ content: OK_REACTION });
      return;
    }

    case "list": {
      const notes = await withStep(ctx, "db_read", () => listNotesFor(actorId));
      if (notes.length === 0) {
        await interaction.reply({ content: "No notes found.", flags: MessageFlags.Ephemeral });
        return;
      }
      const embeds = notes.slice(0, MAX_NOTE_EMBEDS).map(buildNoteEmbed);
      const extra = notes.length - embeds.length;
      await interaction.reply({
        content: extra > 0 ? `Showing ${embeds.length} of ${notes.length} notes.` : undefined,
        embeds,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    case "purge": {
      const removed = await withStep(ctx, "db_write", () => deleteAllNotesFor(actorId));
      await interaction.reply({
        content: removed === 0 ? "No notes found." : `${OK_REACTION} Removed ${removed} note(s).`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    default:
      await fail(interaction, `Unknown subcommand: ${sub}`);
  }
}
