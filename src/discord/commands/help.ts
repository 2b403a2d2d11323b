import { SlashCommandBuilder } from 'discord.js';
import { createInteractionTranslator } from '../locale';
import { deferForAudience, replyInChunks } from '../middleware/defer';
import { splitMessage } from '../renderers/huntText';
import type { CommandAudience, CommandModule } from './types';

function commandLines(commands: readonly CommandModule[], audience: CommandAudience): string[] {
  return commands
    .filter((command) => command.audience === audience)
    .map((command) => {
      const json = command.data.toJSON();
      const description = 'description' in json ? json.description : '';
      return `/${command.name}: ${description}`;
    });
}

export const helpCommand: CommandModule = {
  name: 'help',
  audience: 'participant',
  directMessageOnly: false,
  data: new SlashCommandBuilder()
    .setName('help')
    .setDescription('List the available commands')
    .setDescriptionLocalizations({ de: 'Verfügbare Befehle anzeigen' })
    .setDMPermission(true),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);

    const sections = [
      [tr.t('help.participant_header'), ...commandLines(ctx.commands, 'participant')].join('\n'),
      tr.t('help.submission_hint')
    ];

    if (ctx.core.isMaintainer(interaction.user.id)) {
      sections.push([tr.t('help.maintainer_header'), ...commandLines(ctx.commands, 'maintainer')].join('\n'));
    }

    await replyInChunks(interaction, splitMessage(sections.join('\n\n')));
  }
};
