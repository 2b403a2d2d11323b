import { SlashCommandBuilder } from 'discord.js';
import { logger } from '../../lib/logger';
import { createInteractionTranslator } from '../locale';
import { deferForAudience } from '../middleware/defer';
import { renderTeamOverview } from '../renderers/huntText';
import type { CommandModule } from './types';

export const teamCommand: CommandModule = {
  name: 'team',
  audience: 'participant',
  directMessageOnly: true,
  data: new SlashCommandBuilder()
    .setName('team')
    .setDescription('Join a team or look at your team')
    .setDescriptionLocalizations({ de: 'Einem Team beitreten oder dein Team ansehen' })
    .setDMPermission(true)
    .addSubcommand((sub) =>
      sub
        .setName('join')
        .setDescription('Join a team; replaces your current team')
        .addStringOption((opt) =>
          opt.setName('name').setDescription('Team name').setRequired(true).setMaxLength(100),
        ),
    )
    .addSubcommand((sub) => sub.setName('overview').setDescription('Show your team and its members')),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);
    const sub = interaction.options.getSubcommand();

    if (sub === 'join') {
      const participant = await ctx.core.joinTeam({
        userId: interaction.user.id,
        team: interaction.options.getString('name', true),
        username: interaction.user.username,
        displayName: interaction.user.globalName ?? interaction.user.username
      });

      await interaction.editReply(tr.t('team.joined', { team: participant.team }));

      // The reply does not wait for the team channel.
      void ctx.core.reconcileTopology('team_join').catch((error: unknown) => {
        logger.error({ feature: 'topology', action: 'reconcile_after_join', error }, 'Reconcile after team join failed');
      });
      return;
    }

    const overview = await ctx.core.teamOverview(interaction.user.id);
    await interaction.editReply(renderTeamOverview(tr, overview));
  }
};
