import type { ChallengePoints, Judgement, SubmissionView, TeamScore } from '../../domain/hunt/model';
import type { ParticipantId } from '../../domain/ids';
import type { HuntStore } from '../ports/huntStore';
import { requireParticipant } from './rosterService';

export type ParticipantScore = {
  team: string;
  challenges: ChallengePoints[];
  total: number;
  submissionCount: number;
};

export type TeamSubmissions = {
  team: string;
  submissions: SubmissionView[];
};

export type TeamJudgements = {
  team: string;
  judgements: Judgement[];
};

// Scores follow each submitter's live team, not the team frozen on the submission.
export async function leaderboard(store: HuntStore): Promise<TeamScore[]> {
  return store.leaderboard();
}

export async function participantScore(store: HuntStore, participantId: ParticipantId): Promise<ParticipantScore> {
  const participant = await requireParticipant(store, participantId);
  const [challenges, submissionCount] = await Promise.all([
    store.listTeamChallengePoints(participantId),
    store.countTeamSubmissions(participantId)
  ]);

  return {
    team: participant.team,
    challenges,
    total: challenges.reduce((sum, entry) => sum + entry.points, 0),
    submissionCount
  };
}

export async function listSubmissions(store: HuntStore): Promise<SubmissionView[]> {
  return store.listSubmissionViews();
}

export async function listJudgements(store: HuntStore): Promise<Judgement[]> {
  return store.listJudgements();
}

/** Per scoring team, the submissions filed under that team name. */
export async function listTeamSubmissions(store: HuntStore): Promise<TeamSubmissions[]> {
  const board = await store.leaderboard();
  return Promise.all(
    board.map(async (entry) => ({
      team: entry.team,
      submissions: await store.listSubmissionViews({ team: entry.team })
    })),
  );
}

export async function listTeamJudgements(store: HuntStore): Promise<TeamJudgements[]> {
  const board = await store.leaderboard();
  return Promise.all(
    board.map(async (entry) => ({
      team: entry.team,
      judgements: await store.listJudgements({ team: entry.team })
    })),
  );
}
