import { asc, count, eq } from 'drizzle-orm';
import type { UpsertParticipantInput } from '../../../app/ports/huntStore';
import type { Participant, TeamSummary } from '../../../domain/hunt/model';
import { asParticipantId, type ParticipantId } from '../../../domain/ids';
import { db } from '../drizzle';
import { participants } from '../schema';

type ParticipantRow = typeof participants.$inferSelect;

export function toParticipant(row: ParticipantRow): Participant {
  return {
    id: asParticipantId(row.userId),
    username: row.username,
    displayName: row.displayName,
    team: row.team
  };
}

export async function upsertParticipant(input: UpsertParticipantInput): Promise<Participant> {
  const [row] = await db
    .insert(participants)
    .values({
      userId: input.id,
      username: input.username,
      displayName: input.displayName,
      team: input.team
    })
    .onConflictDoUpdate({
      target: participants.userId,
      set: {
        username: input.username,
        displayName: input.displayName,
        team: input.team,
        updatedAt: new Date()
      }
    })
    .returning();

  if (!row) {
    throw new Error(`Participant upsert returned no row for ${input.id}`);
  }

  return toParticipant(row);
}

export async function getParticipant(id: ParticipantId): Promise<Participant | null> {
  const rows = await db.select().from(participants).where(eq(participants.userId, id)).limit(1);
  const row = rows[0];
  return row ? toParticipant(row) : null;
}

export async function listParticipants(): Promise<Participant[]> {
  const rows = await db
    .select()
    .from(participants)
    .orderBy(asc(participants.team), asc(participants.displayName));
  return rows.map(toParticipant);
}

export async function listParticipantsByTeam(team: string): Promise<Participant[]> {
  const rows = await db
    .select()
    .from(participants)
    .where(eq(participants.team, team))
    .orderBy(asc(participants.displayName));
  return rows.map(toParticipant);
}

export async function listTeams(): Promise<TeamSummary[]> {
  return db
    .select({ team: participants.team, memberCount: count() })
    .from(participants)
    .groupBy(participants.team)
    .orderBy(asc(participants.team));
}
