import { DomainError, ErrorCodes } from '../../domain/errors';
import { normalizeTeamName, type Participant, type TeamSummary } from '../../domain/hunt/model';
import type { ParticipantId } from '../../domain/ids';
import { logger } from '../../lib/logger';
import type { HuntStore } from '../ports/huntStore';

export type JoinTeamInput = {
  participantId: ParticipantId;
  team: string;
  username: string | null;
  displayName: string;
};

export type TeamOverview = {
  team: string;
  members: Participant[];
};

export type TeamRoster = {
  team: string;
  members: Participant[];
};

/**
 * Binds the participant to `team`, replacing any earlier binding. Submissions
 * already filed keep the team name they were filed under.
 */
export async function joinTeam(store: HuntStore, input: JoinTeamInput): Promise<Participant> {
  const team = normalizeTeamName(input.team);
  if (team.length === 0) {
    throw new DomainError('Team name must not be empty', ErrorCodes.EmptyInput);
  }

  const previous = await store.getParticipant(input.participantId);
  const participant = await store.upsertParticipant({
    id: input.participantId,
    team,
    username: input.username,
    displayName: input.displayName
  });

  logger.info(
    {
      feature: 'roster',
      action: 'join_team',
      participant_id: input.participantId,
      team,
      previous_team: previous?.team ?? null
    },
    'Participant joined team',
  );

  return participant;
}

export async function requireParticipant(store: HuntStore, participantId: ParticipantId): Promise<Participant> {
  const participant = await store.getParticipant(participantId);
  if (!participant) {
    throw new DomainError('Participant has not joined a team', ErrorCodes.NotRegistered);
  }

  return participant;
}

export async function getTeamOverview(store: HuntStore, participantId: ParticipantId): Promise<TeamOverview> {
  const participant = await requireParticipant(store, participantId);
  const members = await store.listParticipantsByTeam(participant.team);

  return { team: participant.team, members };
}

export async function listTeams(store: HuntStore): Promise<TeamSummary[]> {
  return store.listTeams();
}

export async function listParticipants(store: HuntStore): Promise<Participant[]> {
  return store.listParticipants();
}

export async function listTeamRosters(store: HuntStore): Promise<TeamRoster[]> {
  const participants = await store.listParticipants();
  const rosters = new Map<string, Participant[]>();

  for (const participant of participants) {
    const members = rosters.get(participant.team) ?? [];
    members.push(participant);
    rosters.set(participant.team, members);
  }

  return [...rosters.entries()].map(([team, members]) => ({ team, members }));
}
