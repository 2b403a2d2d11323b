import { AttachmentBuilder, SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import type { ConfigLocator } from '../../domain/hunt/configLocator';
import { createInteractionTranslator, type Translator } from '../locale';
import { deferForAudience } from '../middleware/defer';
import { renderEmergency } from '../renderers/huntText';
import type { CommandModule } from './types';

async function replyWithLocator(
  interaction: ChatInputCommandInteraction,
  tr: Translator,
  locator: ConfigLocator,
  caption: 'schedule.caption' | 'guide.caption',
): Promise<void> {
  if (locator.kind === 'url') {
    await interaction.editReply(`${tr.t(caption)}: ${locator.url}`);
    return;
  }

  await interaction.editReply({
    content: tr.t(caption),
    files: [new AttachmentBuilder(locator.path)]
  });
}

export const scheduleCommand: CommandModule = {
  name: 'schedule',
  audience: 'participant',
  directMessageOnly: true,
  data: new SlashCommandBuilder()
    .setName('schedule')
    .setDescription('Show the event schedule')
    .setDescriptionLocalizations({ de: 'Zeitplan der Veranstaltung anzeigen' })
    .setDMPermission(true),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);
    await replyWithLocator(interaction, tr, await ctx.core.schedule(), 'schedule.caption');
  }
};

export const survivalGuideCommand: CommandModule = {
  name: 'survival-guide',
  audience: 'participant',
  directMessageOnly: true,
  data: new SlashCommandBuilder()
    .setName('survival-guide')
    .setDescription('Get the city survival guide')
    .setDescriptionLocalizations({ de: 'Survival Guide für die Stadt' })
    .setDMPermission(true),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);
    await replyWithLocator(interaction, tr, await ctx.core.survivalGuide(), 'guide.caption');
  }
};

export const emergencyCommand: CommandModule = {
  name: 'emergency',
  audience: 'participant',
  directMessageOnly: true,
  data: new SlashCommandBuilder()
    .setName('emergency')
    .setDescription('Show the safety team on duty and emergency numbers')
    .setDescriptionLocalizations({ de: 'Safety-Team im Dienst und Notrufnummern' })
    .setDMPermission(true),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);
    await interaction.editReply(renderEmergency(tr, await ctx.core.emergencyInfo()));
  }
};
