import { describe, expect, it, vi } from 'vitest';
import { createTestCore, join, JUDGE_CHANNEL, photo, river, tower } from '../support/testCore';

const judges = { kind: 'channel', channelId: JUDGE_CHANNEL } as const;

async function registeredWithChannel() {
  const harness = createTestCore();
  await harness.core.joinTeam({ userId: '200', team: 'Alpha', username: 'alice', displayName: 'Alice' });
  await harness.core.reconcileTopology('team_join');
  return harness;
}

describe('submission intake', () => {
  it('stores the media and routes it into the team thread', async () => {
    const { core, store, transport, archive } = await registeredWithChannel();

    const result = await core.submit({ userId: '200', messageId: '1100', media: photo('a.jpg'), caption: 'at the tower' });

    expect(result.channelId).toBe('thread-1');
    expect(result.submission).toMatchObject({ id: '1100', participantId: '200', team: 'Alpha', mediaType: 'photo' });
    expect(result.delivery.every((step) => step.ok)).toBe(true);
    expect([...archive.files.keys()]).toEqual(['archive/1100_a.jpg']);
    expect(store.submissions.get('1100')?.mediaPath).toBe('archive/1100_a.jpg');

    expect(transport.callsOf('forwardMessage')).toEqual([
      {
        op: 'forwardMessage',
        target: judges,
        source: { userId: '200', messageId: '1100' },
        options: { threadId: 'thread-1' }
      }
    ]);
    expect(transport.callsOf('sendMessage')).toEqual([
      {
        op: 'sendMessage',
        target: judges,
        text:
          'Submission from @alice (Alice)\nTeam: Alpha\nTime: 2026-11-12 11:01:00\nCaption: at the tower\nID: 1100',
        options: { threadId: 'thread-1', silent: true, replyToMessageId: 'sent-1' }
      }
    ]);
    expect(transport.callsOf('sendJudgingPrompt')).toEqual([
      {
        op: 'sendJudgingPrompt',
        target: judges,
        prompt: { participantId: '200', submissionId: '1100', challenges: [river, tower] },
        options: { threadId: 'thread-1', silent: true }
      }
    ]);
  });

  it('refuses submissions while intake is closed', async () => {
    const { core, store, transport } = await registeredWithChannel();
    core.setSubmissionsEnabled(false, 'maint-1');

    await expect(
      core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' }),
    ).rejects.toMatchObject({ code: 'SUBMISSIONS_DISABLED' });
    expect(transport.callsOf('downloadMedia')).toEqual([]);
    expect(store.submissions.size).toBe(0);

    core.setSubmissionsEnabled(true, 'maint-1');
    expect(core.submissionsEnabled()).toBe(true);
    await expect(
      core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' }),
    ).resolves.toMatchObject({ channelId: 'thread-1' });
  });

  it('refuses participants without a team', async () => {
    const { core, transport } = createTestCore();

    await expect(
      core.submit({ userId: '999', messageId: '1100', media: photo(), caption: '' }),
    ).rejects.toMatchObject({ code: 'NOT_REGISTERED' });
    expect(transport.callsOf('downloadMedia')).toEqual([]);
  });

  it('fails the request when the download fails', async () => {
    const { core, store, transport } = await registeredWithChannel();
    transport.failOn('downloadMedia');

    await expect(
      core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' }),
    ).rejects.toMatchObject({ code: 'EXTERNAL_TRANSPORT_ERROR' });
    expect(store.submissions.size).toBe(0);
  });

  it('fails the request when the media cannot be archived or stored', async () => {
    const { core, store, archive } = await registeredWithChannel();
    archive.failing = true;

    await expect(
      core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' }),
    ).rejects.toMatchObject({ code: 'STORE_ERROR', operation: 'archive_media' });

    archive.failing = false;
    store.failOn('insertSubmission');
    await expect(
      core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' }),
    ).rejects.toMatchObject({ code: 'STORE_ERROR', operation: 'insert_submission' });
    expect(store.submissions.size).toBe(0);
  });

  it('keeps the submission when forwarding fails and reports the gap', async () => {
    const { core, store, transport } = await registeredWithChannel();
    transport.failOn('forwardMessage');

    const result = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'x' });

    expect(store.submissions.has('1100')).toBe(true);
    expect(result.delivery.filter((step) => !step.ok).map((step) => step.step)).toEqual(['forward_media']);

    const messages = transport.callsOf('sendMessage');
    expect(messages).toHaveLength(2);
    expect(messages[0]?.options).toEqual({ threadId: 'thread-1', silent: true, replyToMessageId: null });
    expect(messages[1]).toEqual({
      op: 'sendMessage',
      target: judges,
      text: 'Routing of submission 1100 (team Alpha) failed at: forward_media. Judge it with /hunt-admin judge.',
      options: undefined
    });
  });

  it('still succeeds when every routing step fails', async () => {
    const { core, store, transport } = await registeredWithChannel();
    transport.failOn('forwardMessage');
    transport.failOn('sendMessage');
    transport.failOn('sendJudgingPrompt');

    const result = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'x' });

    expect(result.delivery.filter((step) => !step.ok).map((step) => step.step)).toEqual([
      'forward_media',
      'post_summary',
      'post_judging_prompt'
    ]);
    expect(store.submissions.has('1100')).toBe(true);
  });

  it('skips the prompt when the remaining challenges cannot be read', async () => {
    const { core, store, transport } = await registeredWithChannel();
    store.failOn('listRemainingChallenges');

    const result = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'x' });

    expect(result.remainingChallenges).toBeNull();
    expect(transport.callsOf('sendJudgingPrompt')).toEqual([]);
    expect(transport.callsOf('sendMessage').at(-1)?.text).toBe(
      'Routing of submission 1100 (team Alpha) failed at: list_remaining_challenges. Judge it with /hunt-admin judge.',
    );
  });

  it('routes un-threaded when the team has no open channel', async () => {
    const { core, transport } = createTestCore();
    await join(core, '200', 'Alpha');

    const result = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' });

    expect(result.channelId).toBeNull();
    expect(transport.callsOf('forwardMessage')[0]?.options).toEqual({ threadId: null });
    expect(result.delivery.every((step) => step.ok)).toBe(true);
  });

  it('freezes the team a submission was filed under', async () => {
    const { core } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' });

    await join(core, '200', 'Beta');

    const [submission] = await core.listSubmissions();
    expect(submission?.team).toBe('Alpha');
  });

  it('offers only challenges the team has not solved yet', async () => {
    const { core, transport } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' });
    await core.judge({ submissionId: '1100', choice: 'photo_tower', judgedBy: 'maint-1' });

    await core.submit({ userId: '200', messageId: '1101', media: photo(), caption: '' });

    expect(transport.callsOf('sendJudgingPrompt').at(-1)?.prompt.challenges).toEqual([river]);
  });

  it('keeps offering challenges judged unclear or invalid', async () => {
    const { core, transport } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: '' });
    await core.judge({ submissionId: '1100', choice: '___unclear', judgedBy: 'maint-1' });
    await core.submit({ userId: '200', messageId: '1101', media: photo(), caption: '' });
    await core.judge({ submissionId: '1101', choice: '___invalid', judgedBy: 'maint-1' });

    await core.submit({ userId: '200', messageId: '1102', media: photo(), caption: '' });

    expect(transport.callsOf('sendJudgingPrompt').at(-1)?.prompt.challenges).toEqual([river, tower]);
  });

  it('keeps a single row for a repeated message id', async () => {
    const { core, store } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'first' });
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'second' });

    expect(store.submissions.size).toBe(1);
    expect(store.submissions.get('1100')?.caption).toBe('first');
  });

  it('does not download or route a message id that is already on file', async () => {
    const { core, transport } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'first' });

    const again = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'second' });

    expect(again.duplicate).toBe(true);
    expect(again.submission).toMatchObject({ id: '1100', caption: 'first', team: 'Alpha' });
    expect(again.delivery).toEqual([]);
    expect(transport.callsOf('downloadMedia')).toHaveLength(1);
    expect(transport.callsOf('forwardMessage')).toHaveLength(1);
    expect(transport.callsOf('sendJudgingPrompt')).toHaveLength(1);
  });

  it('skips routing when the insert finds the row was stored concurrently', async () => {
    const { core, store, transport } = await registeredWithChannel();
    await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'first' });
    vi.spyOn(store, 'getSubmissionView').mockResolvedValueOnce(null);

    const again = await core.submit({ userId: '200', messageId: '1100', media: photo(), caption: 'second' });

    expect(again).toMatchObject({ duplicate: true, channelId: null, remainingChallenges: null, delivery: [] });
    expect(again.submission).toMatchObject({ id: '1100', caption: 'first', username: 'alice' });
    expect(transport.callsOf('downloadMedia')).toHaveLength(2);
    expect(transport.callsOf('forwardMessage')).toHaveLength(1);
    expect(store.submissions.get('1100')?.caption).toBe('first');
  });
});
