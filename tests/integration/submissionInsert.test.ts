import { describe, expect, it } from 'vitest';
import { asParticipantId, asSubmissionId } from '../../src/domain/ids';
import { buildSubmissionInsert } from '../../src/infra/db/queries/submissions';

describe('submission insert statement', () => {
  const query = buildSubmissionInsert({
    id: asSubmissionId('1100'),
    participantId: asParticipantId('200'),
    caption: 'at the tower',
    mediaType: 'photo',
    mediaPath: 'archive/1100_a.jpg'
  }).toSQL();

  it('reads the team from participants inside the insert', () => {
    expect(query.sql).toMatch(
      /\(select ("participants"\.)?"team" from "participants" where ("participants"\.)?"user_id" = \$\d+\)/,
    );
    expect(query.sql.startsWith('insert into "submissions"')).toBe(true);
  });

  it('ignores a repeated message id', () => {
    expect(query.sql).toContain('on conflict ("message_id") do nothing');
    expect(query.params).toContain('1100');
    expect(query.params.filter((param) => param === '200')).toHaveLength(2);
  });
});
