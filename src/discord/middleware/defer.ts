import { MessageFlags, type RepliableInteraction } from 'discord.js';

// Participant replies in DMs are visible; everything else stays ephemeral.
export async function deferForAudience(interaction: RepliableInteraction): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }

  if (interaction.guildId === null) {
    await interaction.deferReply();
    return;
  }

  await interaction.deferReply({ flags: MessageFlags.Ephemeral });
}

/** Edits the deferred reply with the first chunk and sends the rest as follow-ups. */
export async function replyInChunks(interaction: RepliableInteraction, chunks: readonly string[]): Promise<void> {
  const [first, ...rest] = chunks;
  await interaction.editReply(first ?? '');

  const ephemeral = interaction.guildId !== null;
  for (const content of rest) {
    await interaction.followUp(ephemeral ? { content, flags: MessageFlags.Ephemeral } : { content });
  }
}
