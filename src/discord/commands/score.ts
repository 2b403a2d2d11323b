import { SlashCommandBuilder } from 'discord.js';
import { createInteractionTranslator } from '../locale';
import { deferForAudience, replyInChunks } from '../middleware/defer';
import { renderScore, splitMessage } from '../renderers/huntText';
import type { CommandModule } from './types';

export const scoreCommand: CommandModule = {
  name: 'score',
  audience: 'participant',
  directMessageOnly: true,
  data: new SlashCommandBuilder()
    .setName('score')
    .setDescription("Show your team's solved challenges and total score")
    .setDescriptionLocalizations({ de: 'Gelöste Challenges und Punktestand deines Teams' })
    .setDMPermission(true),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);

    const score = await ctx.core.score(interaction.user.id);
    await replyInChunks(interaction, splitMessage(renderScore(tr, score)));
  }
};
