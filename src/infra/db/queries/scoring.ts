import { and, asc, count, desc, eq, inArray, sql } from 'drizzle-orm';
import type { ChallengePoints, TeamScore } from '../../../domain/hunt/model';
import type { ParticipantId } from '../../../domain/ids';
import { db } from '../drizzle';
import { judgements, participants, submissions } from '../schema';
import { currentTeamOf } from './teamScope';

// Every rollup joins through participants so points follow the submitter's current team.
const pointsSum = sql<number>`coalesce(sum(${judgements.points}), 0)`.mapWith(Number);

const validPointsSum = sql<number>`coalesce(sum(${judgements.points}) filter (where ${judgements.valid}), 0)`.mapWith(
  Number,
);

// Every live team is listed, with 0 until one of its members has a valid judgement.
export async function leaderboard(): Promise<TeamScore[]> {
  return db
    .select({ team: participants.team, score: validPointsSum })
    .from(participants)
    .leftJoin(submissions, eq(submissions.userId, participants.userId))
    .leftJoin(judgements, eq(judgements.submissionId, submissions.messageId))
    .groupBy(participants.team)
    .orderBy(desc(validPointsSum), asc(participants.team));
}

export async function listTeamChallengePoints(participantId: ParticipantId): Promise<ChallengePoints[]> {
  return db
    .select({ challengeName: judgements.challengeName, points: pointsSum })
    .from(judgements)
    .innerJoin(submissions, eq(submissions.messageId, judgements.submissionId))
    .innerJoin(participants, eq(participants.userId, submissions.userId))
    .where(and(eq(judgements.valid, true), inArray(participants.team, currentTeamOf(participantId))))
    .groupBy(judgements.challengeName)
    .orderBy(asc(judgements.challengeName));
}

export async function countTeamSubmissions(participantId: ParticipantId): Promise<number> {
  const rows = await db
    .select({ total: count() })
    .from(submissions)
    .innerJoin(participants, eq(participants.userId, submissions.userId))
    .where(inArray(participants.team, currentTeamOf(participantId)));
  return rows[0]?.total ?? 0;
}
