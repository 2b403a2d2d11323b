import { and, asc, eq } from 'drizzle-orm';
import type { TopologyEntry } from '../../../domain/hunt/model';
import { asChannelId } from '../../../domain/ids';
import { db } from '../drizzle';
import { teamChannels } from '../schema';

type TeamChannelRow = typeof teamChannels.$inferSelect;

function toTopologyEntry(row: TeamChannelRow): TopologyEntry {
  return {
    id: row.id,
    teamName: row.teamName,
    channelId: asChannelId(row.channelId),
    open: row.open
  };
}

export async function listTopologyEntries(): Promise<TopologyEntry[]> {
  const rows = await db.select().from(teamChannels).orderBy(asc(teamChannels.id));
  return rows.map(toTopologyEntry);
}

export async function findOpenTopologyEntry(teamName: string): Promise<TopologyEntry | null> {
  const rows = await db
    .select()
    .from(teamChannels)
    .where(and(eq(teamChannels.teamName, teamName), eq(teamChannels.open, true)))
    .limit(1);
  const row = rows[0];
  return row ? toTopologyEntry(row) : null;
}

// The partial unique index rejects a second open entry for the same team.
export async function insertTopologyEntry(input: { teamName: string; channelId: string }): Promise<TopologyEntry> {
  const [row] = await db
    .insert(teamChannels)
    .values({ teamName: input.teamName, channelId: input.channelId, open: true })
    .returning();

  if (!row) {
    throw new Error(`Topology insert returned no row for team ${input.teamName}`);
  }

  return toTopologyEntry(row);
}

export async function closeTopologyEntry(id: number): Promise<void> {
  await db
    .update(teamChannels)
    .set({ open: false, closedAt: new Date() })
    .where(eq(teamChannels.id, id));
}
