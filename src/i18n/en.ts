export const en = {
  'error.command_failed': 'Something went wrong. Please try again later.',
  'error.unknown_command': 'Unknown command.',
  'error.not_registered': 'You are not part of a team. Use /team join to join a team.',
  'error.submissions_disabled': 'Submissions are currently disabled.',
  'error.submission_not_found': 'Submission not found.',
  'error.challenge_not_found': 'Challenge not found.',
  'error.empty_input': 'Please provide a value, e.g. /team join followed by the team name.',
  'error.maintainer_only': 'This command is reserved for maintainers.',
  'error.dm_only': 'Please use me in a private chat.',
  'team.joined':
    'You joined team `{team}`.\n\nCheck the team members with /team overview.\n' +
    "Don't change your team after the first submission; earlier submissions stop counting for you.",
  'team.overview': 'Overview team `{team}`\n\n{count} member(s):\n{members}',
  'score.line': '- {challenge} +{points} pts.',
  'score.empty': 'No challenges solved yet.',
  'score.summary': '{lines}\n\nTotal score of team `{team}` from {submissions} submissions: {total}',
  'schedule.caption': 'Schedule',
  'guide.caption': 'Survival guide',
  'emergency.body':
    'Our safety team right now. Do not hesitate to talk to any other tutors.\n{contacts}\n\n' +
    '🚑 **Fire brigade & ambulance: 112**\n👮 Police: 110',
  'emergency.none': 'No safety team available right now',
  'submission.received': 'Submission received. The judges will have a look.',
  'dm.unsupported': "Sorry, this type of message isn't supported.",
  'dm.unknown': "Sorry, I didn't understand your message. /help",
  'dm.beer': 'I love Bavarian beer!',
  'dm.cheers': 'Prost!',
  'dm.greeting': 'Servus!',
  'help.participant_header': 'Participant commands:',
  'help.maintainer_header': 'Maintainer commands:',
  'help.submission_hint': 'Any photo or video you send me here counts as a submission. Please add a meaningful caption!',
  'admin.state.enabled': 'enabled',
  'admin.state.disabled': 'disabled',
  'admin.submissions_toggled': 'Submissions are now {state}.',
  'admin.teams': 'Teams:\n{rows}',
  'admin.members': 'Participants by team:\n{rows}',
  'admin.participants': 'Participants:\n{rows}',
  'admin.scoreboard': 'Scoreboard:\n{rows}',
  'admin.submissions': 'Submissions:\n{rows}',
  'admin.team_submissions': 'Submissions for team `{team}`:\n{rows}',
  'admin.judgements': 'Judgements:\n{rows}',
  'admin.team_judgements': 'Judgements for team `{team}`:\n{rows}',
  'admin.empty_list': '(none)',
  'admin.reconciled': 'Team channels updated: {created} created, {closed} closed, {failed} failed.',
  'admin.broadcast_sent': 'Message sent to {delivered} participant(s), {failed} failed.',
  'admin.judged': 'Submission successfully judged.',
  'judge.feedback.unclear': 'Please resend your submission with a clear caption',
  'judge.feedback.invalid': 'Your submission is invalid',
  'judge.prompt': 'Select challenge or action',
  'judge.select_placeholder': 'Challenge ({page}/{pages})',
  'judge.unclear_button': '⚠️ Unclear',
  'judge.invalid_button': '❌ Invalid',
  'judge.decision': 'Decision **{choice}**\n\nOverwrite with `/hunt-admin judge submission:{submissionId} challenge:<name>`'
} as const;

export type I18nKey = keyof typeof en;
