import type { I18nKey } from './en';

export const de: Record<I18nKey, string> = {
  'error.command_failed': 'Etwas ist schiefgelaufen. Bitte versuche es später erneut.',
  'error.unknown_command': 'Unbekannter Befehl.',
  'error.not_registered': 'Du bist in keinem Team. Tritt mit /team join einem Team bei.',
  'error.submissions_disabled': 'Einsendungen sind gerade deaktiviert.',
  'error.submission_not_found': 'Einsendung nicht gefunden.',
  'error.challenge_not_found': 'Challenge nicht gefunden.',
  'error.empty_input': 'Bitte gib einen Wert an, z. B. /team join gefolgt vom Teamnamen.',
  'error.maintainer_only': 'Dieser Befehl ist dem Orga-Team vorbehalten.',
  'error.dm_only': 'Bitte schreib mir in einem privaten Chat.',
  'team.joined':
    'Du bist Team `{team}` beigetreten.\n\nDeine Teammitglieder siehst du mit /team overview.\n' +
    'Wechsle dein Team nach der ersten Einsendung nicht mehr; frühere Einsendungen zählen sonst nicht mehr für dich.',
  'team.overview': 'Übersicht Team `{team}`\n\n{count} Mitglied(er):\n{members}',
  'score.line': '- {challenge} +{points} Pkt.',
  'score.empty': 'Noch keine Challenge geschafft.',
  'score.summary': '{lines}\n\nGesamtpunktzahl von Team `{team}` aus {submissions} Einsendungen: {total}',
  'schedule.caption': 'Zeitplan',
  'guide.caption': 'Survival Guide',
  'emergency.body':
    'Unser Safety-Team gerade. Sprich gerne auch jeden anderen Tutor an.\n{contacts}\n\n' +
    '🚑 **Feuerwehr & Rettungsdienst: 112**\n👮 Polizei: 110',
  'emergency.none': 'Gerade ist kein Safety-Team verfügbar',
  'submission.received': 'Einsendung erhalten. Die Jury schaut sie sich an.',
  'dm.unsupported': 'Diese Art von Nachricht wird leider nicht unterstützt.',
  'dm.unknown': 'Das habe ich leider nicht verstanden. /help',
  'dm.beer': 'Ich liebe bayerisches Bier!',
  'dm.cheers': 'Prost!',
  'dm.greeting': 'Servus!',
  'help.participant_header': 'Befehle für Teilnehmende:',
  'help.maintainer_header': 'Befehle für das Orga-Team:',
  'help.submission_hint': 'Jedes Foto oder Video, das du mir hier schickst, zählt als Einsendung. Bitte mit aussagekräftiger Beschreibung!',
  'admin.state.enabled': 'aktiviert',
  'admin.state.disabled': 'deaktiviert',
  'admin.submissions_toggled': 'Einsendungen sind jetzt {state}.',
  'admin.teams': 'Teams:\n{rows}',
  'admin.members': 'Teilnehmende nach Team:\n{rows}',
  'admin.participants': 'Teilnehmende:\n{rows}',
  'admin.scoreboard': 'Punktestand:\n{rows}',
  'admin.submissions': 'Einsendungen:\n{rows}',
  'admin.team_submissions': 'Einsendungen von Team `{team}`:\n{rows}',
  'admin.judgements': 'Bewertungen:\n{rows}',
  'admin.team_judgements': 'Bewertungen von Team `{team}`:\n{rows}',
  'admin.empty_list': '(keine)',
  'admin.reconciled': 'Team-Kanäle aktualisiert: {created} erstellt, {closed} geschlossen, {failed} fehlgeschlagen.',
  'admin.broadcast_sent': 'Nachricht an {delivered} Teilnehmende gesendet, {failed} fehlgeschlagen.',
  'admin.judged': 'Einsendung bewertet.',
  'judge.feedback.unclear': 'Bitte schick deine Einsendung erneut mit einer klaren Beschreibung',
  'judge.feedback.invalid': 'Deine Einsendung ist ungültig',
  'judge.prompt': 'Challenge oder Aktion wählen',
  'judge.select_placeholder': 'Challenge ({page}/{pages})',
  'judge.unclear_button': '⚠️ Unklar',
  'judge.invalid_button': '❌ Ungültig',
  'judge.decision': 'Entscheidung **{choice}**\n\nÜberschreiben mit `/hunt-admin judge submission:{submissionId} challenge:<name>`'
};
