import type { Interaction } from 'discord.js';
import { logger } from '../lib/logger';

export function logInteraction(params: {
  interaction: Interaction;
  feature: string;
  action: string;
  submissionId?: string | null;
}) {
  logger.info(
    {
      guild_id: params.interaction.guildId,
      channel_id: params.interaction.channelId,
      user_id: params.interaction.user.id,
      interaction_id: params.interaction.id,
      feature: params.feature,
      action: params.action,
      submission_id: params.submissionId ?? null
    },
    'interaction',
  );
}
