import { ErrorCodes, isUserFacingError, type ErrorCode } from '../domain/errors';
import type { I18nKey } from '../i18n';
import type { Translator } from './locale';

const userFacingMessageKey: Partial<Record<ErrorCode, I18nKey>> = {
  [ErrorCodes.NotRegistered]: 'error.not_registered',
  [ErrorCodes.SubmissionsDisabled]: 'error.submissions_disabled',
  [ErrorCodes.SubmissionNotFound]: 'error.submission_not_found',
  [ErrorCodes.ChallengeNotFound]: 'error.challenge_not_found',
  [ErrorCodes.EmptyInput]: 'error.empty_input'
};

/** Reply text for errors the user caused; null for faults. */
export function formatUserFacingError(tr: Translator, error: unknown): string | null {
  if (!isUserFacingError(error)) {
    return null;
  }

  const key = userFacingMessageKey[error.code];
  return key ? tr.t(key) : null;
}
