import { and, asc, eq, inArray, notInArray } from 'drizzle-orm';
import type { Challenge } from '../../../domain/hunt/model';
import type { ParticipantId } from '../../../domain/ids';
import { db } from '../drizzle';
import { challenges, judgements, participants, submissions } from '../schema';
import { currentTeamOf } from './teamScope';

const challengeColumns = {
  name: challenges.name,
  shortName: challenges.shortName
};

export async function findChallenge(name: string): Promise<Challenge | null> {
  const rows = await db.select(challengeColumns).from(challenges).where(eq(challenges.name, name)).limit(1);
  return rows[0] ?? null;
}

/** Catalog challenges the caller's current team has no valid judgement for yet. */
export async function listRemainingChallenges(participantId: ParticipantId): Promise<Challenge[]> {
  const solved = db
    .select({ name: judgements.challengeName })
    .from(judgements)
    .innerJoin(submissions, eq(submissions.messageId, judgements.submissionId))
    .innerJoin(participants, eq(participants.userId, submissions.userId))
    .where(and(eq(judgements.valid, true), inArray(participants.team, currentTeamOf(participantId))));

  return db
    .select(challengeColumns)
    .from(challenges)
    .where(notInArray(challenges.name, solved))
    .orderBy(asc(challenges.name));
}
