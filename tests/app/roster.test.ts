import { describe, expect, it } from 'vitest';
import { createTestCore, join } from '../support/testCore';

describe('roster', () => {
  it('normalizes team names on join', async () => {
    const { core } = createTestCore();

    const participant = await core.joinTeam({
      userId: '200',
      team: '  Team   Alpha ',
      username: 'alice',
      displayName: 'Alice'
    });

    expect(participant.team).toBe('Team Alpha');
  });

  it('rejects blank team names', async () => {
    const { core, store } = createTestCore();

    await expect(
      core.joinTeam({ userId: '200', team: '   ', username: 'alice', displayName: 'Alice' }),
    ).rejects.toMatchObject({ code: 'EMPTY_INPUT' });
    expect(store.participants.size).toBe(0);
  });

  it('moves a participant when they join another team', async () => {
    const { core } = createTestCore();
    await join(core, '200', 'Alpha', 'Alice');
    await join(core, '201', 'Alpha', 'Bob');
    await join(core, '200', 'Beta', 'Alice');

    expect(await core.listTeams()).toEqual([
      { team: 'Alpha', memberCount: 1 },
      { team: 'Beta', memberCount: 1 }
    ]);

    const overview = await core.teamOverview('200');
    expect(overview.team).toBe('Beta');
    expect(overview.members.map((member) => member.displayName)).toEqual(['Alice']);
  });

  it('groups rosters by team', async () => {
    const { core } = createTestCore();
    await join(core, '201', 'Beta', 'Bob');
    await join(core, '200', 'Alpha', 'Alice');
    await join(core, '202', 'Alpha', 'Carol');

    const rosters = await core.listTeamMembers();
    expect(rosters.map((roster) => [roster.team, roster.members.map((member) => member.displayName)])).toEqual([
      ['Alpha', ['Alice', 'Carol']],
      ['Beta', ['Bob']]
    ]);
  });

  it('refuses an overview to participants without a team', async () => {
    const { core } = createTestCore();
    await expect(core.teamOverview('999')).rejects.toMatchObject({ code: 'NOT_REGISTERED' });
  });

  it('knows its maintainers', () => {
    const { core } = createTestCore({ maintainerIds: ['maint-1'] });
    expect(core.isMaintainer('maint-1')).toBe(true);
    expect(core.isMaintainer('200')).toBe(false);
  });
});
