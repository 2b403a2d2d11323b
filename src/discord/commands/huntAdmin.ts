import { SlashCommandBuilder } from 'discord.js';
import { createInteractionTranslator } from '../locale';
import { deferForAudience, replyInChunks } from '../middleware/defer';
import {
  renderJudgements,
  renderParticipants,
  renderRosters,
  renderScoreboard,
  renderSubmissions,
  renderTeamJudgements,
  renderTeams,
  renderTeamSubmissions,
  splitBlocks,
  splitMessage
} from '../renderers/huntText';
import type { CommandModule } from './types';

export const huntAdminCommand: CommandModule = {
  name: 'hunt-admin',
  audience: 'maintainer',
  directMessageOnly: false,
  data: new SlashCommandBuilder()
    .setName('hunt-admin')
    .setDescription('Maintainer tools for the hunt')
    .setDescriptionLocalizations({ de: 'Werkzeuge für das Orga-Team' })
    .setDMPermission(true)
    .addSubcommand((sub) =>
      sub
        .setName('submissions')
        .setDescription('Enable or disable new submissions')
        .addBooleanOption((opt) => opt.setName('enabled').setDescription('Accept submissions').setRequired(true)),
    )
    .addSubcommand((sub) => sub.setName('teams').setDescription('List teams with member counts'))
    .addSubcommand((sub) => sub.setName('members').setDescription('List participants grouped by team'))
    .addSubcommand((sub) => sub.setName('participants').setDescription('List all participants'))
    .addSubcommand((sub) => sub.setName('scoreboard').setDescription('Show the leaderboard'))
    .addSubcommand((sub) => sub.setName('submissions-list').setDescription('List all submissions'))
    .addSubcommand((sub) => sub.setName('team-submissions').setDescription('List submissions per scoring team'))
    .addSubcommand((sub) => sub.setName('judgements').setDescription('List all judgements'))
    .addSubcommand((sub) => sub.setName('team-judgements').setDescription('List judgements per scoring team'))
    .addSubcommand((sub) => sub.setName('update-channels').setDescription('Reconcile team channels with the roster'))
    .addSubcommand((sub) =>
      sub
        .setName('broadcast')
        .setDescription('Send a message to every participant')
        .addStringOption((opt) =>
          opt.setName('text').setDescription('Message text').setRequired(true).setMaxLength(1900),
        ),
    )
    .addSubcommand((sub) =>
      sub
        .setName('judge')
        .setDescription('Judge or re-judge a submission')
        .addStringOption((opt) => opt.setName('submission').setDescription('Submission id').setRequired(true))
        .addStringOption((opt) =>
          opt.setName('challenge').setDescription('Challenge name, ___unclear or ___invalid').setRequired(true),
        ),
    ),
  async execute(ctx, interaction) {
    const tr = createInteractionTranslator(interaction);
    await deferForAudience(interaction);
    const sub = interaction.options.getSubcommand();

    switch (sub) {
      case 'submissions': {
        const enabled = interaction.options.getBoolean('enabled', true);
        ctx.core.setSubmissionsEnabled(enabled, interaction.user.id);
        await interaction.editReply(
          tr.t('admin.submissions_toggled', { state: tr.t(enabled ? 'admin.state.enabled' : 'admin.state.disabled') }),
        );
        return;
      }
      case 'teams':
        await replyInChunks(interaction, splitMessage(renderTeams(tr, await ctx.core.listTeams())));
        return;
      case 'members':
        await replyInChunks(interaction, splitMessage(renderRosters(tr, await ctx.core.listTeamMembers())));
        return;
      case 'participants':
        await replyInChunks(interaction, splitMessage(renderParticipants(tr, await ctx.core.listParticipants())));
        return;
      case 'scoreboard':
        await replyInChunks(interaction, splitMessage(renderScoreboard(tr, await ctx.core.leaderboard())));
        return;
      case 'submissions-list':
        await replyInChunks(
          interaction,
          splitMessage(renderSubmissions(tr, await ctx.core.listSubmissions(), ctx.timeZone)),
        );
        return;
      case 'team-submissions': {
        const blocks = renderTeamSubmissions(tr, await ctx.core.listTeamSubmissions(), ctx.timeZone);
        await replyInChunks(interaction, blocks.length > 0 ? splitBlocks(blocks) : [tr.t('admin.empty_list')]);
        return;
      }
      case 'judgements':
        await replyInChunks(interaction, splitMessage(renderJudgements(tr, await ctx.core.listJudgements())));
        return;
      case 'team-judgements': {
        const blocks = renderTeamJudgements(tr, await ctx.core.listTeamJudgements());
        await replyInChunks(interaction, blocks.length > 0 ? splitBlocks(blocks) : [tr.t('admin.empty_list')]);
        return;
      }
      case 'update-channels': {
        const report = await ctx.core.reconcileTopology('maintainer_command');
        const failures = report.failures.map((failure) => `- ${failure.team} (${failure.action})`);
        const summary = tr.t('admin.reconciled', {
          created: report.created.length,
          closed: report.closed.length,
          failed: report.failures.length
        });
        await replyInChunks(interaction, splitMessage([summary, ...failures].join('\n')));
        return;
      }
      case 'broadcast': {
        const result = await ctx.core.broadcast({
          senderId: interaction.user.id,
          senderName: interaction.user.globalName ?? interaction.user.username,
          text: interaction.options.getString('text', true)
        });
        await interaction.editReply(
          tr.t('admin.broadcast_sent', { delivered: result.delivered, failed: result.failed.length }),
        );
        return;
      }
      case 'judge': {
        await ctx.core.judge({
          submissionId: interaction.options.getString('submission', true).trim(),
          choice: interaction.options.getString('challenge', true),
          judgedBy: interaction.user.id
        });
        await interaction.editReply(tr.t('admin.judged'));
        return;
      }
      default:
        await interaction.editReply(tr.t('error.unknown_command'));
    }
  }
};
