import { MessageFlags, type RepliableInteraction } from 'discord.js';
import type { HuntCore } from '../../app/huntCore';
import type { Translator } from '../locale';

export function isDirectMessage(interaction: { guildId: string | null }): boolean {
  return interaction.guildId === null;
}

/** Replies with the refusal and returns false when the caller is not a maintainer. */
export async function ensureMaintainer(
  core: Pick<HuntCore, 'isMaintainer'>,
  interaction: RepliableInteraction,
  tr: Translator,
): Promise<boolean> {
  if (core.isMaintainer(interaction.user.id)) {
    return true;
  }

  await interaction.reply({ flags: MessageFlags.Ephemeral, content: tr.t('error.maintainer_only') });
  return false;
}

export async function ensureDirectMessage(interaction: RepliableInteraction, tr: Translator): Promise<boolean> {
  if (isDirectMessage(interaction)) {
    return true;
  }

  await interaction.reply({ flags: MessageFlags.Ephemeral, content: tr.t('error.dm_only') });
  return false;
}
