import type { Judgement, Participant, SubmissionView, TeamScore, TeamSummary } from '../domain/hunt/model';
import type { ConfigLocator } from '../domain/hunt/configLocator';
import { asParticipantId, asSubmissionId } from '../domain/ids';
import type { ChatTransport, MediaRef } from './ports/chatTransport';
import type { HuntStore } from './ports/huntStore';
import type { MediaArchive } from './ports/mediaArchive';
import { ExclusiveLock } from './policies/exclusiveLock';
import { broadcast, type BroadcastResult } from './services/broadcastService';
import { emergencyInfo, resolveSchedule, resolveSurvivalGuide, type EmergencyInfo } from './services/eventInfoService';
import { judgeSubmission, type JudgeSubmissionResult } from './services/judgementService';
import {
  getTeamOverview,
  joinTeam,
  listParticipants,
  listTeamRosters,
  listTeams,
  type TeamOverview,
  type TeamRoster
} from './services/rosterService';
import {
  leaderboard,
  listJudgements,
  listSubmissions,
  listTeamJudgements,
  listTeamSubmissions,
  participantScore,
  type ParticipantScore,
  type TeamJudgements,
  type TeamSubmissions
} from './services/scoringService';
import { SubmissionGate } from './services/submissionGate';
import { submitMedia, type SubmitMediaResult } from './services/submissionService';
import { TopologySynchronizer, type ReconcileReason, type ReconcileReport } from './services/topologyService';

export type HuntCoreDeps = {
  store: HuntStore;
  transport: ChatTransport;
  archive: MediaArchive;
  judgeChannelId: string;
  maintainerIds: readonly string[];
  submissionsEnabled: boolean;
  timeZone: string;
};

/** One entry point per command the bot exposes. */
export type HuntCore = {
  isMaintainer: (userId: string) => boolean;

  joinTeam: (input: { userId: string; team: string; username: string | null; displayName: string }) => Promise<Participant>;
  teamOverview: (userId: string) => Promise<TeamOverview>;
  score: (userId: string) => Promise<ParticipantScore>;
  schedule: () => Promise<ConfigLocator>;
  survivalGuide: () => Promise<ConfigLocator>;
  emergencyInfo: (now?: Date) => Promise<EmergencyInfo>;

  submit: (input: { userId: string; messageId: string; media: MediaRef; caption: string }) => Promise<SubmitMediaResult>;
  judge: (input: {
    submissionId: string;
    choice: string;
    judgedBy: string | null;
    participantId?: string;
  }) => Promise<JudgeSubmissionResult>;

  submissionsEnabled: () => boolean;
  setSubmissionsEnabled: (enabled: boolean, changedBy: string) => void;
  listTeams: () => Promise<TeamSummary[]>;
  listTeamMembers: () => Promise<TeamRoster[]>;
  listParticipants: () => Promise<Participant[]>;
  leaderboard: () => Promise<TeamScore[]>;
  listSubmissions: () => Promise<SubmissionView[]>;
  listTeamSubmissions: () => Promise<TeamSubmissions[]>;
  listJudgements: () => Promise<Judgement[]>;
  listTeamJudgements: () => Promise<TeamJudgements[]>;
  reconcileTopology: (reason: ReconcileReason) => Promise<ReconcileReport>;
  broadcast: (input: { senderId: string; senderName: string; text: string }) => Promise<BroadcastResult>;
};

export function createHuntCore(deps: HuntCoreDeps): HuntCore {
  const maintainerIds = new Set(deps.maintainerIds);
  const gate = new SubmissionGate(deps.submissionsEnabled);
  const topology = new TopologySynchronizer({
    store: deps.store,
    transport: deps.transport,
    judgeChannelId: deps.judgeChannelId,
    lock: new ExclusiveLock('topology')
  });

  return {
    isMaintainer: (userId) => maintainerIds.has(userId),

    joinTeam: (input) =>
      joinTeam(deps.store, {
        participantId: asParticipantId(input.userId),
        team: input.team,
        username: input.username,
        displayName: input.displayName
      }),
    teamOverview: (userId) => getTeamOverview(deps.store, asParticipantId(userId)),
    score: (userId) => participantScore(deps.store, asParticipantId(userId)),
    schedule: () => resolveSchedule(deps.store),
    survivalGuide: () => resolveSurvivalGuide(deps.store),
    emergencyInfo: (now = new Date()) => emergencyInfo(deps.store, now, deps.timeZone),

    submit: (input) =>
      submitMedia(
        {
          store: deps.store,
          transport: deps.transport,
          archive: deps.archive,
          gate,
          topology,
          judgeChannelId: deps.judgeChannelId,
          timeZone: deps.timeZone
        },
        {
          participantId: asParticipantId(input.userId),
          messageId: asSubmissionId(input.messageId),
          media: input.media,
          caption: input.caption
        },
      ),
    judge: (input) =>
      judgeSubmission(
        { store: deps.store, transport: deps.transport },
        {
          submissionId: asSubmissionId(input.submissionId),
          choice: input.choice,
          judgedBy: input.judgedBy,
          participantId: input.participantId ? asParticipantId(input.participantId) : undefined
        },
      ),

    submissionsEnabled: () => gate.isEnabled(),
    setSubmissionsEnabled: (enabled, changedBy) => gate.setEnabled(enabled, changedBy),
    listTeams: () => listTeams(deps.store),
    listTeamMembers: () => listTeamRosters(deps.store),
    listParticipants: () => listParticipants(deps.store),
    leaderboard: () => leaderboard(deps.store),
    listSubmissions: () => listSubmissions(deps.store),
    listTeamSubmissions: () => listTeamSubmissions(deps.store),
    listJudgements: () => listJudgements(deps.store),
    listTeamJudgements: () => listTeamJudgements(deps.store),
    reconcileTopology: (reason) => topology.reconcile(reason),
    broadcast: (input) =>
      broadcast(
        { store: deps.store, transport: deps.transport, maintainerIds },
        { senderId: asParticipantId(input.senderId), senderName: input.senderName, text: input.text },
      )
  };
}
