import { asc, eq } from 'drizzle-orm';
import type { UpsertJudgementInput } from '../../../app/ports/huntStore';
import type { Judgement } from '../../../domain/hunt/model';
import { asSubmissionId } from '../../../domain/ids';
import { db } from '../drizzle';
import { judgements, submissions } from '../schema';

type JudgementRow = typeof judgements.$inferSelect;

function toJudgement(row: JudgementRow): Judgement {
  return {
    submissionId: asSubmissionId(row.submissionId),
    challengeName: row.challengeName,
    points: row.points,
    valid: row.valid,
    judgedBy: row.judgedBy
  };
}

// Last write wins: a second decision replaces the first.
export async function upsertJudgement(input: UpsertJudgementInput): Promise<Judgement> {
  const now = new Date();
  const [row] = await db
    .insert(judgements)
    .values({
      submissionId: input.submissionId,
      challengeName: input.challengeName,
      points: input.points,
      valid: input.valid,
      judgedBy: input.judgedBy
    })
    .onConflictDoUpdate({
      target: judgements.submissionId,
      set: {
        challengeName: input.challengeName,
        points: input.points,
        valid: input.valid,
        judgedBy: input.judgedBy,
        updatedAt: now
      }
    })
    .returning();

  if (!row) {
    throw new Error(`Judgement upsert returned no row for ${input.submissionId}`);
  }

  return toJudgement(row);
}

export async function listJudgements(filter: { team?: string } = {}): Promise<Judgement[]> {
  if (filter.team === undefined) {
    const rows = await db.select().from(judgements).orderBy(asc(judgements.createdAt));
    return rows.map(toJudgement);
  }

  const rows = await db
    .select({ judgement: judgements })
    .from(judgements)
    .innerJoin(submissions, eq(submissions.messageId, judgements.submissionId))
    .where(eq(submissions.team, filter.team))
    .orderBy(asc(judgements.createdAt));
  return rows.map((row) => toJudgement(row.judgement));
}
