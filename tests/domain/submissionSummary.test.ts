import { describe, expect, it } from 'vitest';
import type { SubmissionView } from '../../src/domain/hunt/model';
import { archiveFileName, renderSubmissionSummary } from '../../src/domain/hunt/submissionSummary';
import { asParticipantId, asSubmissionId } from '../../src/domain/ids';

function view(overrides: Partial<SubmissionView> = {}): SubmissionView {
  return {
    id: asSubmissionId('1100'),
    participantId: asParticipantId('200'),
    team: 'Alpha',
    caption: 'Tower at night',
    mediaType: 'photo',
    mediaPath: 'submissions/1100_proof.jpg',
    createdAt: new Date('2026-11-12T09:30:00.000Z'),
    username: 'alice',
    displayName: 'Alice',
    ...overrides
  };
}

describe('submission summary', () => {
  it('renders the judge summary in the event time zone', () => {
    expect(renderSubmissionSummary(view(), 'Europe/Berlin')).toBe(
      'Submission from @alice (Alice)\nTeam: Alpha\nTime: 2026-11-12 10:30:00\nCaption: Tower at night\nID: 1100',
    );
  });

  it('uses placeholders for a missing caption and username', () => {
    const text = renderSubmissionSummary(view({ caption: '  ', username: null }), 'UTC');
    expect(text.split('\n')).toEqual([
      'Submission from @- (Alice)',
      'Team: Alpha',
      'Time: 2026-11-12 09:30:00',
      'Caption: N/P',
      'ID: 1100'
    ]);
  });
});

describe('archive file names', () => {
  it('prefixes the submission id and replaces unsafe characters', () => {
    expect(archiveFileName('1100', 'my photo.jpg')).toBe('1100_my_photo.jpg');
    expect(archiveFileName('1100', '../x.png')).toBe('1100_.._x.png');
  });

  it('falls back to a generic name', () => {
    expect(archiveFileName('1100', '')).toBe('1100_media');
  });
});
