/**
 * Ghostline — tests/utils/contextFactory.ts
 * WHAT: CommandContext stand-ins so handlers can be called directly, without wrapCommand.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext, InstrumentedInteraction } from "../../src/lib/cmdWrap.js";

export const TEST_TRACE_ID = "test-trace-1";

export function createTestCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I,
  onStep?: (phase: string) => void
): CommandContext<I> {
  let phase = "enter";
  return {
    interaction,
    traceId: TEST_TRACE_ID,
    currentPhase: () => phase,
    step: (next) => {
      phase = next;
      onStep?.(next);
    },
  };
}

/** Also returns every phase the handler marked, in order. */
export function createSpiedCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I
): { ctx: CommandContext<I>; phases: string[] } {
  const phases: string[] = [];
  return { ctx: createTestCommandContext(interaction, (phase) => phases.push(phase)), phases };
}
