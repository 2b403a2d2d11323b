import type { ParticipantId, SubmissionId } from '../../domain/ids';
import type {
  Challenge,
  ChallengePoints,
  Judgement,
  MediaType,
  Participant,
  SafetyContact,
  Submission,
  SubmissionView,
  TeamScore,
  TeamSummary,
  TopologyEntry
} from '../../domain/hunt/model';

export type UpsertParticipantInput = {
  id: ParticipantId;
  team: string;
  username: string | null;
  displayName: string;
};

export type InsertSubmissionInput = {
  id: SubmissionId;
  participantId: ParticipantId;
  caption: string;
  mediaType: MediaType;
  mediaPath: string | null;
};

export type InsertedSubmission = {
  submission: Submission;
  // false when a row with the same message id already existed; that row is returned unchanged.
  created: boolean;
};

export type UpsertJudgementInput = {
  submissionId: SubmissionId;
  challengeName: string;
  points: number;
  valid: boolean;
  judgedBy: string | null;
};

/**
 * Durable storage used by the hunt core. Every method is a single
 * auto-committed statement.
 */
export interface HuntStore {
  upsertParticipant(input: UpsertParticipantInput): Promise<Participant>;
  getParticipant(id: ParticipantId): Promise<Participant | null>;
  listParticipants(): Promise<Participant[]>;
  listParticipantsByTeam(team: string): Promise<Participant[]>;
  listTeams(): Promise<TeamSummary[]>;

  listTopologyEntries(): Promise<TopologyEntry[]>;
  findOpenTopologyEntry(teamName: string): Promise<TopologyEntry | null>;
  insertTopologyEntry(input: { teamName: string; channelId: string }): Promise<TopologyEntry>;
  closeTopologyEntry(id: number): Promise<void>;

  // Copies the participant's current team onto the row in the same statement; null when the participant is missing.
  insertSubmission(input: InsertSubmissionInput): Promise<InsertedSubmission | null>;
  getSubmissionView(id: SubmissionId): Promise<SubmissionView | null>;
  getSubmissionOwner(id: SubmissionId): Promise<Participant | null>;
  listSubmissionViews(filter?: { team?: string }): Promise<SubmissionView[]>;

  findChallenge(name: string): Promise<Challenge | null>;
  listRemainingChallenges(participantId: ParticipantId): Promise<Challenge[]>;

  upsertJudgement(input: UpsertJudgementInput): Promise<Judgement>;
  listJudgements(filter?: { team?: string }): Promise<Judgement[]>;

  leaderboard(): Promise<TeamScore[]>;
  listTeamChallengePoints(participantId: ParticipantId): Promise<ChallengePoints[]>;
  countTeamSubmissions(participantId: ParticipantId): Promise<number>;

  getConfigValue(name: string): Promise<string | null>;
  listSafetyContacts(dutyDate: string): Promise<SafetyContact[]>;
}
