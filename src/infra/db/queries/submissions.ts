import { asc, eq, sql } from 'drizzle-orm';
import type { InsertedSubmission, InsertSubmissionInput } from '../../../app/ports/huntStore';
import { StoreError } from '../../../domain/errors';
import { mediaTypes, type MediaType, type Participant, type Submission, type SubmissionView } from '../../../domain/hunt/model';
import { asParticipantId, asSubmissionId, type SubmissionId } from '../../../domain/ids';
import { db } from '../drizzle';
import { participants, submissions } from '../schema';
import { getParticipant, toParticipant } from './participants';

type SubmissionRow = typeof submissions.$inferSelect;

function toMediaType(value: string): MediaType {
  const mediaType = mediaTypes.find((candidate) => candidate === value);
  if (!mediaType) {
    throw new StoreError(`Unknown media type in store: ${value}`, 'read_submission');
  }
  return mediaType;
}

function toSubmission(row: SubmissionRow): Submission {
  return {
    id: asSubmissionId(row.messageId),
    participantId: asParticipantId(row.userId),
    team: row.team,
    caption: row.caption,
    mediaType: toMediaType(row.mediaType),
    mediaPath: row.mediaPath,
    createdAt: row.createdAt
  };
}

const viewColumns = {
  submission: submissions,
  username: participants.username,
  displayName: participants.displayName
};

function toSubmissionView(row: {
  submission: SubmissionRow;
  username: string | null;
  displayName: string | null;
}): SubmissionView {
  return {
    ...toSubmission(row.submission),
    username: row.username,
    displayName: row.displayName
  };
}

// The team is read by a subquery of the insert itself, so a concurrent /team join cannot split the two.
export function buildSubmissionInsert(input: InsertSubmissionInput) {
  return db
    .insert(submissions)
    .values({
      messageId: input.id,
      userId: input.participantId,
      team: sql<string>`(select ${participants.team} from ${participants} where ${participants.userId} = ${input.participantId})`,
      caption: input.caption,
      mediaType: input.mediaType,
      mediaPath: input.mediaPath
    })
    .onConflictDoNothing({ target: submissions.messageId })
    .returning();
}

export async function insertSubmission(input: InsertSubmissionInput): Promise<InsertedSubmission | null> {
  if (!(await getParticipant(input.participantId))) {
    return null;
  }

  const [row] = await buildSubmissionInsert(input);
  if (row) {
    return { submission: toSubmission(row), created: true };
  }

  // Same message delivered twice: keep the first row.
  const [existing] = await db.select().from(submissions).where(eq(submissions.messageId, input.id)).limit(1);
  return existing ? { submission: toSubmission(existing), created: false } : null;
}

export async function getSubmissionView(id: SubmissionId): Promise<SubmissionView | null> {
  const rows = await db
    .select(viewColumns)
    .from(submissions)
    .leftJoin(participants, eq(participants.userId, submissions.userId))
    .where(eq(submissions.messageId, id))
    .limit(1);
  const row = rows[0];
  return row ? toSubmissionView(row) : null;
}

export async function getSubmissionOwner(id: SubmissionId): Promise<Participant | null> {
  const rows = await db
    .select({ participant: participants })
    .from(submissions)
    .innerJoin(participants, eq(participants.userId, submissions.userId))
    .where(eq(submissions.messageId, id))
    .limit(1);
  const row = rows[0];
  return row ? toParticipant(row.participant) : null;
}

export async function listSubmissionViews(filter: { team?: string } = {}): Promise<SubmissionView[]> {
  const query = db
    .select(viewColumns)
    .from(submissions)
    .leftJoin(participants, eq(participants.userId, submissions.userId));

  const rows = filter.team === undefined
    ? await query.orderBy(asc(submissions.createdAt))
    : await query.where(eq(submissions.team, filter.team)).orderBy(asc(submissions.createdAt));

  return rows.map(toSubmissionView);
}
