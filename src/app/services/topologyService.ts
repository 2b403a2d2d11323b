import type { TopologyEntry } from '../../domain/hunt/model';
import type { ChannelId } from '../../domain/ids';
import { logger } from '../../lib/logger';
import { attempt } from '../policies/bestEffort';
import { ExclusiveLock } from '../policies/exclusiveLock';
import type { ChatTarget, ChatTransport } from '../ports/chatTransport';
import type { HuntStore } from '../ports/huntStore';

export type ReconcileReason = 'team_join' | 'maintainer_command' | 'scheduled' | 'startup';

export type TopologyFailure = {
  team: string;
  action: 'create' | 'close';
  error: unknown;
};

export type ReconcileReport = {
  created: Array<{ team: string; channelId: string }>;
  closed: Array<{ team: string; channelId: string; alreadyClosed: boolean }>;
  failures: TopologyFailure[];
};

type TopologySynchronizerDeps = {
  store: HuntStore;
  transport: ChatTransport;
  judgeChannelId: string;
  lock?: ExclusiveLock;
};

type CreateResult = { ok: true; team: string; channelId: string } | { ok: false; failure: TopologyFailure };
type CloseResult =
  | { ok: true; team: string; channelId: string; alreadyClosed: boolean }
  | { ok: false; failure: TopologyFailure };

/**
 * Keeps one open team channel (a thread in the judge channel) per live team.
 * Every reconciliation runs under the same process-wide lock.
 */
export class TopologySynchronizer {
  private readonly lock: ExclusiveLock;
  private readonly target: ChatTarget;

  constructor(private readonly deps: TopologySynchronizerDeps) {
    this.lock = deps.lock ?? new ExclusiveLock('topology');
    this.target = { kind: 'channel', channelId: deps.judgeChannelId };
  }

  async reconcile(reason: ReconcileReason): Promise<ReconcileReport> {
    return this.lock.runExclusive(() => this.diffAndApply(reason));
  }

  async lookupChannel(team: string): Promise<ChannelId | null> {
    const entry = await this.deps.store.findOpenTopologyEntry(team);
    return entry?.channelId ?? null;
  }

  private async diffAndApply(reason: ReconcileReason): Promise<ReconcileReport> {
    const teams = new Set((await this.deps.store.listTeams()).map((summary) => summary.team));
    const entries = await this.deps.store.listTopologyEntries();

    const openByTeam = new Map<string, TopologyEntry>();
    const toClose: TopologyEntry[] = [];

    for (const entry of entries) {
      if (!entry.open) {
        continue;
      }

      if (!teams.has(entry.teamName) || openByTeam.has(entry.teamName)) {
        toClose.push(entry);
        continue;
      }

      openByTeam.set(entry.teamName, entry);
    }

    const toCreate = [...teams].filter((team) => !openByTeam.has(team));

    logger.info(
      {
        feature: 'topology',
        action: 'reconcile',
        reason,
        teams: teams.size,
        to_create: toCreate.length,
        to_close: toClose.length
      },
      'Reconciling team channels',
    );

    const created = await Promise.all(toCreate.map((team) => this.createTeamChannel(team)));
    const closed = await Promise.all(toClose.map((entry) => this.closeTeamChannel(entry)));

    const report: ReconcileReport = { created: [], closed: [], failures: [] };

    for (const result of created) {
      if (result.ok) {
        report.created.push({ team: result.team, channelId: result.channelId });
      } else {
        report.failures.push(result.failure);
      }
    }

    for (const result of closed) {
      if (result.ok) {
        report.closed.push({ team: result.team, channelId: result.channelId, alreadyClosed: result.alreadyClosed });
      } else {
        report.failures.push(result.failure);
      }
    }

    if (report.failures.length > 0) {
      logger.warn(
        {
          feature: 'topology',
          action: 'reconcile',
          reason,
          failed_teams: report.failures.map((failure) => `${failure.action}:${failure.team}`)
        },
        'Team channel reconciliation finished with failures',
      );
    }

    return report;
  }

  private async createTeamChannel(team: string): Promise<CreateResult> {
    let channelId: string;
    try {
      channelId = await this.deps.transport.createTopic(this.target, team);
    } catch (error) {
      return { ok: false, failure: { team, action: 'create', error } };
    }

    try {
      await this.deps.store.insertTopologyEntry({ teamName: team, channelId });
    } catch (error) {
      // Without a row nothing would ever close the new thread.
      await attempt('topology.close_orphan', () => this.deps.transport.closeTopic(this.target, channelId), {
        team,
        channel_id: channelId
      });
      return { ok: false, failure: { team, action: 'create', error } };
    }

    logger.info({ feature: 'topology', action: 'create', team, channel_id: channelId }, 'Team channel created');
    return { ok: true, team, channelId };
  }

  private async closeTeamChannel(entry: TopologyEntry): Promise<CloseResult> {
    try {
      const result = await this.deps.transport.closeTopic(this.target, entry.channelId);
      await this.deps.store.closeTopologyEntry(entry.id);

      logger.info(
        { feature: 'topology', action: 'close', team: entry.teamName, channel_id: entry.channelId, result },
        'Team channel closed',
      );
      return { ok: true, team: entry.teamName, channelId: entry.channelId, alreadyClosed: result === 'already_closed' };
    } catch (error) {
      return { ok: false, failure: { team: entry.teamName, action: 'close', error } };
    }
  }
}
