import { describe, expect, it } from 'vitest';
import { createTestCore, join, photo } from '../support/testCore';

describe('hunt event', () => {
  it('runs from team formation to the final scoreboard', async () => {
    const { core, store, transport } = createTestCore();

    await join(core, '200', 'Alpha', 'Alice');
    await join(core, '201', 'Alpha', 'Bob');
    await join(core, '300', 'Beta', 'Carol');
    await core.reconcileTopology('team_join');

    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'tower' });
    await core.submit({ userId: '300', messageId: '1200', media: photo(), caption: 'river' });
    await core.submit({ userId: '201', messageId: '1101', media: photo(), caption: 'blurry' });

    expect(transport.callsOf('forwardMessage').map((call) => call.options?.threadId)).toEqual([
      'thread-1',
      'thread-2',
      'thread-1'
    ]);

    await core.judge({ submissionId: '1100', choice: 'photo_tower', judgedBy: 'maint-1' });
    await core.judge({ submissionId: '1200', choice: 'photo_river', judgedBy: 'maint-1' });
    await core.judge({ submissionId: '1101', choice: '___unclear', judgedBy: 'maint-1' });
    await core.judge({ submissionId: '1101', choice: 'photo_river', judgedBy: 'maint-1' });

    core.setSubmissionsEnabled(false, 'maint-1');
    await expect(
      core.submit({ userId: '300', messageId: '1201', media: photo(), caption: 'late' }),
    ).rejects.toMatchObject({ code: 'SUBMISSIONS_DISABLED' });

    // Carol moves over; her solved challenge now counts for Alpha and Beta's thread closes.
    await join(core, '300', 'Alpha', 'Carol');
    const report = await core.reconcileTopology('team_join');

    expect(report.closed).toEqual([{ team: 'Beta', channelId: 'thread-2', alreadyClosed: false }]);
    expect(await core.leaderboard()).toEqual([{ team: 'Alpha', score: 3 }]);
    expect(await core.score('201')).toMatchObject({ team: 'Alpha', total: 3, submissionCount: 3 });
    expect(store.judgements.size).toBe(3);
  });

  it('scores a re-judged submission by its last judgement', async () => {
    const { core, store } = createTestCore();
    store.addChallenges({ name: 'photo_safety', shortName: 'Safety first' });

    await join(core, '400', 'Falcons', 'Finn');
    await core.submit({ userId: '400', messageId: '1400', media: photo(), caption: 'helmet on' });

    await core.judge({ submissionId: '1400', choice: 'photo_safety', judgedBy: 'maint-1' });
    expect((await core.score('400')).total).toBe(1);
    expect(await core.leaderboard()).toEqual([{ team: 'Falcons', score: 1 }]);

    await core.judge({ submissionId: '1400', choice: '___invalid', judgedBy: 'maint-1' });
    expect(await core.score('400')).toEqual({ team: 'Falcons', challenges: [], total: 0, submissionCount: 1 });
    expect(await core.leaderboard()).toEqual([{ team: 'Falcons', score: 0 }]);
    expect(store.judgements.size).toBe(1);
  });
});
