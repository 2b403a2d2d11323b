import { describe, expect, it } from 'vitest';
import { createTranslator } from '../../src/discord/locale';
import {
  renderEmergency,
  renderJudgementLine,
  renderScore,
  renderScoreboard,
  renderTeamOverview,
  renderTeams,
  splitBlocks,
  splitMessage
} from '../../src/discord/renderers/huntText';
import { asParticipantId, asSubmissionId } from '../../src/domain/ids';

const tr = createTranslator('en');

describe('hunt text renderers', () => {
  it('renders the scoreboard in rank order', () => {
    expect(
      renderScoreboard(tr, [
        { team: 'Alpha', score: 3 },
        { team: 'Beta', score: 1 }
      ]),
    ).toBe('Scoreboard:\n1. Alpha: 3\n2. Beta: 1');
    expect(renderScoreboard(tr, [])).toBe('Scoreboard:\n(none)');
  });

  it('renders a team score with per-challenge lines', () => {
    expect(
      renderScore(tr, {
        team: 'Alpha',
        challenges: [{ challengeName: 'photo_tower', points: 2 }],
        total: 2,
        submissionCount: 3
      }),
    ).toBe('- photo_tower +2 pts.\n\nTotal score of team `Alpha` from 3 submissions: 2');
  });

  it('renders an empty score', () => {
    expect(renderScore(tr, { team: 'Beta', challenges: [], total: 0, submissionCount: 0 })).toBe(
      'No challenges solved yet.\n\nTotal score of team `Beta` from 0 submissions: 0',
    );
  });

  it('renders a team overview', () => {
    expect(
      renderTeamOverview(tr, {
        team: 'Alpha',
        members: [
          { id: asParticipantId('1'), username: 'alice', displayName: 'Alice', team: 'Alpha' },
          { id: asParticipantId('2'), username: null, displayName: 'Bob', team: 'Alpha' }
        ]
      }),
    ).toBe('Overview team `Alpha`\n\n2 member(s):\n- Alice @alice\n- Bob');
  });

  it('renders team counts and judgement lines', () => {
    expect(renderTeams(tr, [{ team: 'Alpha', memberCount: 2 }])).toBe('Teams:\n- Alpha (2)');
    expect(
      renderJudgementLine({
        submissionId: asSubmissionId('1100'),
        challengeName: 'photo_tower',
        points: 1,
        valid: true,
        judgedBy: null
      }),
    ).toBe('- `1100` photo_tower 1 pts (valid) by -');
  });

  it('falls back to the no-safety-team notice', () => {
    expect(renderEmergency(tr, { dutyDate: '2026-11-12', contacts: [] })).toBe('No safety team available right now');
  });
});

describe('message splitting', () => {
  it('splits on line boundaries', () => {
    expect(splitMessage('aaa\nbbb\nccc', 7)).toEqual(['aaa\nbbb', 'ccc']);
  });

  it('cuts single overlong lines hard', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('returns one empty chunk for empty text', () => {
    expect(splitMessage('')).toEqual(['']);
  });

  it('keeps block boundaries', () => {
    expect(splitBlocks(['a\nb', 'c'], 10)).toEqual(['a\nb', 'c']);
  });
});
