import { eq } from 'drizzle-orm';
import type { ParticipantId } from '../../../domain/ids';
import { db } from '../drizzle';
import { participants } from '../schema';

/** Subquery yielding the caller's current team; empty when the caller is unknown. */
export function currentTeamOf(participantId: ParticipantId) {
  return db
    .select({ team: participants.team })
    .from(participants)
    .where(eq(participants.userId, participantId));
}
