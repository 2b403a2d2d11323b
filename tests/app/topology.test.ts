import { describe, expect, it } from 'vitest';
import { asChannelId } from '../../src/domain/ids';
import { createTestCore, join, JUDGE_CHANNEL } from '../support/testCore';

function openEntries(store: ReturnType<typeof createTestCore>['store']) {
  return store.topology.filter((entry) => entry.open).map((entry) => [entry.teamName, entry.channelId]);
}

describe('team channel reconciliation', () => {
  it('creates one thread per team in the judge channel', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    await join(core, '201', 'Beta');

    const report = await core.reconcileTopology('team_join');

    expect(report).toEqual({
      created: [
        { team: 'Alpha', channelId: 'thread-1' },
        { team: 'Beta', channelId: 'thread-2' }
      ],
      closed: [],
      failures: []
    });
    expect(transport.callsOf('createTopic')).toEqual([
      { op: 'createTopic', target: { kind: 'channel', channelId: JUDGE_CHANNEL }, name: 'Alpha' },
      { op: 'createTopic', target: { kind: 'channel', channelId: JUDGE_CHANNEL }, name: 'Beta' }
    ]);
    expect(openEntries(store)).toEqual([
      ['Alpha', 'thread-1'],
      ['Beta', 'thread-2']
    ]);
  });

  it('does nothing when already in sync', async () => {
    const { core, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    await core.reconcileTopology('team_join');

    const report = await core.reconcileTopology('scheduled');

    expect(report).toEqual({ created: [], closed: [], failures: [] });
    expect(transport.callsOf('createTopic')).toHaveLength(1);
  });

  it('never opens two threads for a team under concurrent runs', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    await join(core, '201', 'Beta');

    await Promise.all([
      core.reconcileTopology('team_join'),
      core.reconcileTopology('team_join'),
      core.reconcileTopology('scheduled')
    ]);

    expect(transport.callsOf('createTopic')).toHaveLength(2);
    expect(openEntries(store)).toHaveLength(2);
  });

  it('closes the thread of a team that lost its last member', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    await join(core, '201', 'Beta');
    await core.reconcileTopology('team_join');

    await join(core, '201', 'Alpha');
    const report = await core.reconcileTopology('team_join');

    expect(report.closed).toEqual([{ team: 'Beta', channelId: 'thread-2', alreadyClosed: false }]);
    expect(transport.callsOf('closeTopic').map((call) => call.topicId)).toEqual(['thread-2']);
    expect(openEntries(store)).toEqual([['Alpha', 'thread-1']]);
  });

  it('treats a thread closed on the platform as closed', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Beta');
    await core.reconcileTopology('team_join');
    await join(core, '200', 'Alpha');
    transport.alreadyClosed.add('thread-1');

    const report = await core.reconcileTopology('maintainer_command');

    expect(report.closed).toEqual([{ team: 'Beta', channelId: 'thread-1', alreadyClosed: true }]);
    expect(report.created).toEqual([{ team: 'Alpha', channelId: 'thread-2' }]);
    expect(openEntries(store)).toEqual([['Alpha', 'thread-2']]);
  });

  it('closes duplicate open entries and keeps the first', async () => {
    const { core, store } = createTestCore();
    await join(core, '200', 'Alpha');
    store.topology.push(
      { id: 100, teamName: 'Alpha', channelId: asChannelId('old-1'), open: true },
      { id: 101, teamName: 'Alpha', channelId: asChannelId('old-2'), open: true },
    );

    const report = await core.reconcileTopology('startup');

    expect(report.created).toEqual([]);
    expect(report.closed).toEqual([{ team: 'Alpha', channelId: 'old-2', alreadyClosed: false }]);
    expect(openEntries(store)).toEqual([['Alpha', 'old-1']]);
  });

  it('applies the rest of the diff when one team fails', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Beta');
    await core.reconcileTopology('team_join');
    await join(core, '200', 'Gamma');
    transport.failOn('closeTopic');

    const report = await core.reconcileTopology('team_join');

    expect(report.created).toEqual([{ team: 'Gamma', channelId: 'thread-2' }]);
    expect(report.closed).toEqual([]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ team: 'Beta', action: 'close' });
    expect(openEntries(store)).toEqual([
      ['Beta', 'thread-1'],
      ['Gamma', 'thread-2']
    ]);

    transport.recover('closeTopic');
    const retry = await core.reconcileTopology('scheduled');
    expect(retry.closed).toEqual([{ team: 'Beta', channelId: 'thread-1', alreadyClosed: false }]);
    expect(openEntries(store)).toEqual([['Gamma', 'thread-2']]);
  });

  it('closes the new thread again when its row cannot be stored', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    store.failOn('insertTopologyEntry');

    const report = await core.reconcileTopology('team_join');

    expect(report.created).toEqual([]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ team: 'Alpha', action: 'create' });
    expect(transport.callsOf('closeTopic').map((call) => call.topicId)).toEqual(['thread-1']);
    expect(store.topology).toEqual([]);
  });

  it('reports create failures without touching the store', async () => {
    const { core, store, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    transport.failOn('createTopic');

    const report = await core.reconcileTopology('team_join');

    expect(report.failures).toMatchObject([{ team: 'Alpha', action: 'create' }]);
    expect(store.topology).toEqual([]);
  });

  it('propagates a failing store read', async () => {
    const { core, store } = createTestCore();
    store.failOn('listTeams');

    await expect(core.reconcileTopology('scheduled')).rejects.toThrow('listTeams failed');
    store.recover('listTeams');
    await expect(core.reconcileTopology('scheduled')).resolves.toEqual({ created: [], closed: [], failures: [] });
  });
});
