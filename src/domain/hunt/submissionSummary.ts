import { formatTimestamp } from '../../lib/time';
import type { SubmissionView } from './model';

export function renderSubmissionSummary(view: SubmissionView, timeZone: string): string {
  const caption = view.caption.trim().length === 0 ? 'N/P' : view.caption;

  return [
    `Submission from @${view.username ?? '-'} (${view.displayName ?? 'unknown'})`,
    `Team: ${view.team}`,
    `Time: ${formatTimestamp(view.createdAt, timeZone)}`,
    `Caption: ${caption}`,
    `ID: ${view.id}`
  ].join('\n');
}

export function archiveFileName(submissionId: string, originalName: string): string {
  const safeName = originalName.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 80);
  return `${submissionId}_${safeName.length > 0 ? safeName : 'media'}`;
}
