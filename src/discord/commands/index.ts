import type { ChatInputCommandInteraction, RepliableInteraction } from 'discord.js';
import { MessageFlags } from 'discord.js';
import { captureException } from '../../infra/sentry/sentry';
import { createCorrelationId, runWithCorrelation } from '../../lib/correlation';
import { logger } from '../../lib/logger';
import { commandModules } from '../commandDefinitions';
import { formatUserFacingError } from '../featureErrors';
import { logInteraction } from '../interactionLog';
import { createInteractionTranslator } from '../locale';
import { ensureDirectMessage, ensureMaintainer } from '../middleware/guard';
import type { CommandContext, CommandModule } from './types';

const commandMap = new Map<string, CommandModule>(commandModules.map((cmd) => [cmd.name, cmd]));

export async function replyWithText(interaction: RepliableInteraction, content: string): Promise<void> {
  if (interaction.deferred) {
    await interaction.editReply(content);
    return;
  }

  if (!interaction.replied) {
    await interaction.reply({ flags: MessageFlags.Ephemeral, content });
    return;
  }

  await interaction.followUp({ flags: MessageFlags.Ephemeral, content });
}

export async function handleChatInputCommand(
  ctx: CommandContext,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  await runWithCorrelation({ correlationId: createCorrelationId(), source: 'command' }, async () => {
    const tr = createInteractionTranslator(interaction);
    const command = commandMap.get(interaction.commandName);

    logInteraction({
      interaction,
      feature: interaction.commandName,
      action: interaction.options.getSubcommand(false) ?? 'invoke'
    });

    if (!command) {
      logger.warn({ command: interaction.commandName }, 'Unknown command invoked');
      await replyWithText(interaction, tr.t('error.unknown_command'));
      return;
    }

    try {
      if (command.audience === 'maintainer' && !(await ensureMaintainer(ctx.core, interaction, tr))) {
        return;
      }

      if (command.directMessageOnly && !(await ensureDirectMessage(interaction, tr))) {
        return;
      }

      await command.execute(ctx, interaction);
    } catch (error) {
      const userError = formatUserFacingError(tr, error);
      if (userError) {
        logger.info({ feature: command.name, error }, 'Command rejected');
        await replyWithText(interaction, userError);
        return;
      }

      logger.error({ error, command: interaction.commandName }, 'Command execution failed');
      captureException(error, { feature: command.name });
      await replyWithText(interaction, tr.t('error.command_failed'));
    }
  });
}
