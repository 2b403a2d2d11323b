import type { HuntStore } from '../../app/ports/huntStore';
import * as challenges from './queries/challenges';
import * as eventInfo from './queries/eventInfo';
import * as judgements from './queries/judgements';
import * as participants from './queries/participants';
import * as scoring from './queries/scoring';
import * as submissions from './queries/submissions';
import * as topology from './queries/topology';

export const drizzleHuntStore: HuntStore = {
  upsertParticipant: participants.upsertParticipant,
  getParticipant: participants.getParticipant,
  listParticipants: participants.listParticipants,
  listParticipantsByTeam: participants.listParticipantsByTeam,
  listTeams: participants.listTeams,

  listTopologyEntries: topology.listTopologyEntries,
  findOpenTopologyEntry: topology.findOpenTopologyEntry,
  insertTopologyEntry: topology.insertTopologyEntry,
  closeTopologyEntry: topology.closeTopologyEntry,

  insertSubmission: submissions.insertSubmission,
  getSubmissionView: submissions.getSubmissionView,
  getSubmissionOwner: submissions.getSubmissionOwner,
  listSubmissionViews: submissions.listSubmissionViews,

  findChallenge: challenges.findChallenge,
  listRemainingChallenges: challenges.listRemainingChallenges,

  upsertJudgement: judgements.upsertJudgement,
  listJudgements: judgements.listJudgements,

  leaderboard: scoring.leaderboard,
  listTeamChallengePoints: scoring.listTeamChallengePoints,
  countTeamSubmissions: scoring.countTeamSubmissions,

  getConfigValue: eventInfo.getConfigValue,
  listSafetyContacts: eventInfo.listSafetyContacts
};
