import { asc, eq } from 'drizzle-orm';
import type { SafetyContact } from '../../../domain/hunt/model';
import { db } from '../drizzle';
import { config, safetyTeam } from '../schema';

export async function getConfigValue(name: string): Promise<string | null> {
  const rows = await db.select({ value: config.value }).from(config).where(eq(config.name, name)).limit(1);
  return rows[0]?.value ?? null;
}

export async function listSafetyContacts(dutyDate: string): Promise<SafetyContact[]> {
  return db
    .select({ name: safetyTeam.name, phone: safetyTeam.phone })
    .from(safetyTeam)
    .where(eq(safetyTeam.dutyDate, dutyDate))
    .orderBy(asc(safetyTeam.id));
}
