import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { and, eq } from 'drizzle-orm';
import { z } from 'zod';
import { pgPool } from '../src/infra/db/client';
import { db } from '../src/infra/db/drizzle';
import { challenges, config, safetyTeam } from '../src/infra/db/schema';

const seedSchema = z.object({
  challenges: z.array(
    z.object({
      name: z.string().min(1).max(64),
      shortName: z.string().min(1).max(100),
      description: z.string().default(''),
      points: z.number().int().nonnegative().default(1)
    }),
  ),
  safetyTeam: z.array(
    z.object({
      name: z.string().min(1),
      phone: z.string().min(1),
      dutyDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/)
    }),
  ),
  config: z.record(z.string(), z.string())
});

type SeedData = z.infer<typeof seedSchema>;

async function loadSeed(): Promise<SeedData> {
  const file = path.resolve(__dirname, '../data/seed.json');
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  return seedSchema.parse(raw);
}

async function seedChallenges(data: SeedData): Promise<void> {
  for (const challenge of data.challenges) {
    await db
      .insert(challenges)
      .values(challenge)
      .onConflictDoUpdate({
        target: challenges.name,
        set: {
          shortName: challenge.shortName,
          description: challenge.description,
          points: challenge.points
        }
      });
  }
}

// Existing values are operator edits and stay untouched.
async function seedConfig(data: SeedData): Promise<void> {
  for (const [name, value] of Object.entries(data.config)) {
    await db.insert(config).values({ name, value }).onConflictDoNothing({ target: config.name });
  }
}

async function seedSafetyTeam(data: SeedData): Promise<void> {
  for (const contact of data.safetyTeam) {
    const [existing] = await db
      .select({ id: safetyTeam.id })
      .from(safetyTeam)
      .where(and(eq(safetyTeam.name, contact.name), eq(safetyTeam.dutyDate, contact.dutyDate)))
      .limit(1);

    if (existing) {
      await db.update(safetyTeam).set({ phone: contact.phone }).where(eq(safetyTeam.id, existing.id));
      continue;
    }

    await db.insert(safetyTeam).values(contact);
  }
}

async function main() {
  const data = await loadSeed();
  await seedChallenges(data);
  await seedConfig(data);
  await seedSafetyTeam(data);

  console.log(
    `[seed] challenges=${data.challenges.length} safety_team=${data.safetyTeam.length} config=${Object.keys(data.config).length}`,
  );
}

main()
  .then(async () => {
    await pgPool.end();
    process.exit(0);
  })
  .catch(async (error) => {
    console.error('[seed] Failed:', error);
    await pgPool.end();
    process.exit(1);
  });
