import { createHuntCore, type HuntCore } from '../../src/app/huntCore';
import type { MediaRef } from '../../src/app/ports/chatTransport';
import type { Challenge } from '../../src/domain/hunt/model';
import { FakeTransport, MemoryMediaArchive } from './fakeTransport';
import { MemoryHuntStore } from './memoryHuntStore';

export const JUDGE_CHANNEL = 'judges';

export const tower: Challenge = { name: 'photo_tower', shortName: 'Tower' };
export const river: Challenge = { name: 'photo_river', shortName: 'River' };

export type TestHarness = {
  core: HuntCore;
  store: MemoryHuntStore;
  transport: FakeTransport;
  archive: MemoryMediaArchive;
};

export function createTestCore(options: { submissionsEnabled?: boolean; maintainerIds?: string[] } = {}): TestHarness {
  const store = new MemoryHuntStore();
  const transport = new FakeTransport();
  const archive = new MemoryMediaArchive();
  store.addChallenges(tower, river);

  const core = createHuntCore({
    store,
    transport,
    archive,
    judgeChannelId: JUDGE_CHANNEL,
    maintainerIds: options.maintainerIds ?? ['maint-1'],
    submissionsEnabled: options.submissionsEnabled ?? true,
    timeZone: 'Europe/Berlin'
  });

  return { core, store, transport, archive };
}

export function photo(fileName = 'proof.jpg'): MediaRef {
  return { type: 'photo', url: `https://cdn.example.com/${fileName}`, fileName };
}

export async function join(core: HuntCore, userId: string, team: string, displayName = userId): Promise<void> {
  await core.joinTeam({ userId, team, username: displayName.toLowerCase(), displayName });
}
