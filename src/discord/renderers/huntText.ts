import type { EmergencyInfo } from '../../app/services/eventInfoService';
import type { TeamOverview, TeamRoster } from '../../app/services/rosterService';
import type { ParticipantScore, TeamJudgements, TeamSubmissions } from '../../app/services/scoringService';
import {
  formatParticipantName,
  type Judgement,
  type Participant,
  type SubmissionView,
  type TeamScore,
  type TeamSummary
} from '../../domain/hunt/model';
import { formatTimestamp } from '../../lib/time';
import type { Translator } from '../locale';

const CHUNK_LIMIT = 1900;

function orEmpty(tr: Translator, lines: readonly string[]): string {
  return lines.length > 0 ? lines.join('\n') : tr.t('admin.empty_list');
}

export function renderTeamOverview(tr: Translator, overview: TeamOverview): string {
  return tr.t('team.overview', {
    team: overview.team,
    count: overview.members.length,
    members: overview.members.map((member) => `- ${formatParticipantName(member)}`).join('\n')
  });
}

export function renderScore(tr: Translator, score: ParticipantScore): string {
  const lines = score.challenges.length > 0
    ? score.challenges.map((entry) => tr.t('score.line', { challenge: entry.challengeName, points: entry.points })).join('\n')
    : tr.t('score.empty');

  return tr.t('score.summary', {
    lines,
    team: score.team,
    submissions: score.submissionCount,
    total: score.total
  });
}

export function renderEmergency(tr: Translator, info: EmergencyInfo): string {
  if (info.contacts.length === 0) {
    return tr.t('emergency.none');
  }

  return tr.t('emergency.body', {
    contacts: info.contacts.map((contact) => `- ${contact.name}: ${contact.phone}`).join('\n')
  });
}

export function renderTeams(tr: Translator, teams: readonly TeamSummary[]): string {
  return tr.t('admin.teams', {
    rows: orEmpty(tr, teams.map((entry) => `- ${entry.team} (${entry.memberCount})`))
  });
}

export function renderRosters(tr: Translator, rosters: readonly TeamRoster[]): string {
  const blocks = rosters.map((roster) =>
    [`**${roster.team}**`, ...roster.members.map((member) => `  - ${formatParticipantName(member)}`)].join('\n'),
  );
  return tr.t('admin.members', { rows: orEmpty(tr, blocks) });
}

export function renderParticipants(tr: Translator, participants: readonly Participant[]): string {
  return tr.t('admin.participants', {
    rows: orEmpty(tr, participants.map((participant) => `- ${formatParticipantName(participant)} (${participant.team})`))
  });
}

export function renderScoreboard(tr: Translator, scores: readonly TeamScore[]): string {
  return tr.t('admin.scoreboard', {
    rows: orEmpty(tr, scores.map((entry, index) => `${index + 1}. ${entry.team}: ${entry.score}`))
  });
}

export function renderSubmissionLine(view: SubmissionView, timeZone: string): string {
  const caption = view.caption.trim().length > 0 ? view.caption.replace(/\s+/g, ' ') : 'N/P';
  return `- \`${view.id}\` ${formatTimestamp(view.createdAt, timeZone)} ${view.team} / ${formatParticipantName(view)} (${view.mediaType}): ${caption}`;
}

export function renderJudgementLine(judgement: Judgement): string {
  const validity = judgement.valid ? 'valid' : 'not valid';
  return `- \`${judgement.submissionId}\` ${judgement.challengeName} ${judgement.points} pts (${validity}) by ${judgement.judgedBy ?? '-'}`;
}

export function renderSubmissions(tr: Translator, views: readonly SubmissionView[], timeZone: string): string {
  return tr.t('admin.submissions', { rows: orEmpty(tr, views.map((view) => renderSubmissionLine(view, timeZone))) });
}

export function renderTeamSubmissions(tr: Translator, groups: readonly TeamSubmissions[], timeZone: string): string[] {
  return groups.map((group) =>
    tr.t('admin.team_submissions', {
      team: group.team,
      rows: orEmpty(tr, group.submissions.map((view) => renderSubmissionLine(view, timeZone)))
    }),
  );
}

export function renderJudgements(tr: Translator, judgements: readonly Judgement[]): string {
  return tr.t('admin.judgements', { rows: orEmpty(tr, judgements.map(renderJudgementLine)) });
}

export function renderTeamJudgements(tr: Translator, groups: readonly TeamJudgements[]): string[] {
  return groups.map((group) =>
    tr.t('admin.team_judgements', {
      team: group.team,
      rows: orEmpty(tr, group.judgements.map(renderJudgementLine))
    }),
  );
}

/**
 * Splits text into message-sized chunks, preferring line boundaries. A single
 * line longer than the limit is cut hard.
 */
export function splitMessage(text: string, limit = CHUNK_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const candidate = current.length === 0 ? line : `${current}\n${line}`;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      chunks.push(current);
    }

    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }

  if (current.length > 0 || chunks.length === 0) {
    chunks.push(current);
  }

  return chunks;
}

/** Splits every block and keeps block boundaries as message boundaries. */
export function splitBlocks(blocks: readonly string[], limit = CHUNK_LIMIT): string[] {
  return blocks.flatMap((block) => splitMessage(block, limit));
}
