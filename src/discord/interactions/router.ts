import type { ButtonInteraction, StringSelectMenuInteraction } from 'discord.js';
import { MessageFlags } from 'discord.js';
import type { HuntCore } from '../../app/huntCore';
import { captureException } from '../../infra/sentry/sentry';
import { createCorrelationId, runWithCorrelation } from '../../lib/correlation';
import { logger } from '../../lib/logger';
import { formatUserFacingError } from '../featureErrors';
import { logInteraction } from '../interactionLog';
import { createInteractionTranslator, type Translator } from '../locale';
import { ensureMaintainer } from '../middleware/guard';
import { JUDGE_FEATURE, parseJudgeComponent } from './components';
import { decodeCustomId, type CustomIdEnvelope } from './customId';

export type InteractionContext = {
  core: HuntCore;
};

type JudgeInteraction = ButtonInteraction | StringSelectMenuInteraction;

function selectedChoice(interaction: JudgeInteraction, fixedChoice: string | null): string | null {
  if (fixedChoice !== null) {
    return fixedChoice;
  }

  if (!interaction.isStringSelectMenu()) {
    return null;
  }

  return interaction.values[0] ?? null;
}

async function replyEphemeral(interaction: JudgeInteraction, content: string): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    await interaction.followUp({ flags: MessageFlags.Ephemeral, content });
    return;
  }

  await interaction.reply({ flags: MessageFlags.Ephemeral, content });
}

async function handleJudgeComponent(
  ctx: InteractionContext,
  interaction: JudgeInteraction,
  decoded: CustomIdEnvelope,
  tr: Translator,
): Promise<void> {
  const component = parseJudgeComponent(decoded);
  const choice = component ? selectedChoice(interaction, component.fixedChoice) : null;
  if (!component || choice === null) {
    await replyEphemeral(interaction, tr.t('error.command_failed'));
    return;
  }

  logInteraction({ interaction, feature: decoded.feature, action: decoded.action, submissionId: component.submissionId });

  if (!(await ensureMaintainer(ctx.core, interaction, tr))) {
    return;
  }

  await interaction.deferUpdate();

  const result = await ctx.core.judge({
    submissionId: component.submissionId,
    choice,
    judgedBy: interaction.user.id,
    participantId: component.participantId
  });

  await interaction.editReply({
    content: tr.t('judge.decision', { choice: result.challenge.shortName, submissionId: component.submissionId }),
    components: []
  });
}

export async function routeInteractionComponent(ctx: InteractionContext, interaction: JudgeInteraction): Promise<void> {
  await runWithCorrelation({ correlationId: createCorrelationId(), source: 'component' }, async () => {
    const tr = createInteractionTranslator(interaction);

    try {
      const decoded = decodeCustomId(interaction.customId);
      if (decoded.feature === JUDGE_FEATURE) {
        await handleJudgeComponent(ctx, interaction, decoded, tr);
        return;
      }

      logger.warn({ feature: decoded.feature, action: decoded.action }, 'Unhandled component');
      await replyEphemeral(interaction, tr.t('error.unknown_command'));
    } catch (error) {
      const userError = formatUserFacingError(tr, error);
      if (userError) {
        logger.info({ error, interaction_id: interaction.id }, 'Component action rejected');
        await replyEphemeral(interaction, userError);
        return;
      }

      logger.error({ error, interaction_id: interaction.id }, 'Interaction component routing failed');
      captureException(error, { feature: 'interaction' });
      await replyEphemeral(interaction, tr.t('error.command_failed'));
    }
  });
}
