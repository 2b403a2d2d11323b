import type { ChannelId, ParticipantId, SubmissionId } from '../ids';

export const mediaTypes = ['photo', 'video'] as const;
export type MediaType = (typeof mediaTypes)[number];

export type Participant = {
  id: ParticipantId;
  username: string | null;
  displayName: string;
  team: string;
};

export type TeamSummary = {
  team: string;
  memberCount: number;
};

export type TopologyEntry = {
  id: number;
  teamName: string;
  channelId: ChannelId;
  open: boolean;
};

export type Submission = {
  id: SubmissionId;
  participantId: ParticipantId;
  // Team at submission time; later roster changes do not touch it.
  team: string;
  caption: string;
  mediaType: MediaType;
  mediaPath: string | null;
  createdAt: Date;
};

export type SubmissionView = Submission & {
  username: string | null;
  displayName: string | null;
};

export type Challenge = {
  name: string;
  shortName: string;
};

export type Judgement = {
  submissionId: SubmissionId;
  challengeName: string;
  points: number;
  valid: boolean;
  judgedBy: string | null;
};

export type TeamScore = {
  team: string;
  score: number;
};

export type ChallengePoints = {
  challengeName: string;
  points: number;
};

export type SafetyContact = {
  name: string;
  phone: string;
};

export function formatParticipantName(participant: { displayName: string | null; username: string | null }): string {
  const name = participant.displayName ?? 'Unknown';
  return participant.username ? `${name} @${participant.username}` : name;
}

export function normalizeTeamName(raw: string): string {
  return raw.trim().replace(/\s+/g, ' ');
}
