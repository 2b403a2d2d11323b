import { INVALID_CHOICE, POINTS_PER_VALID_JUDGEMENT, UNCLEAR_CHOICE, VALID_SUBMISSION_REACTION } from '../../config/constants';
import type { Challenge } from './model';

export const sentinelChoices = [UNCLEAR_CHOICE, INVALID_CHOICE] as const;
export type SentinelChoice = (typeof sentinelChoices)[number];

export function isSentinelChoice(value: string): value is SentinelChoice {
  return value === UNCLEAR_CHOICE || value === INVALID_CHOICE;
}

export function sentinelChallenge(choice: SentinelChoice): Challenge {
  return choice === UNCLEAR_CHOICE
    ? { name: UNCLEAR_CHOICE, shortName: 'Unclear' }
    : { name: INVALID_CHOICE, shortName: 'Invalid' };
}

export type JudgementOutcome = {
  points: number;
  valid: boolean;
};

/**
 * Points are a flat constant per valid judgement; the challenge catalog's own
 * points column is not consulted.
 */
export function computeJudgementOutcome(choice: string): JudgementOutcome {
  if (isSentinelChoice(choice)) {
    return { points: 0, valid: false };
  }

  return { points: POINTS_PER_VALID_JUDGEMENT, valid: true };
}

export type SubmitterFeedback =
  | { kind: 'reaction'; emoji: string }
  | { kind: 'directive'; reason: 'unclear' | 'invalid' };

export function planSubmitterFeedback(choice: string): SubmitterFeedback {
  if (choice === UNCLEAR_CHOICE) {
    return { kind: 'directive', reason: 'unclear' };
  }

  if (choice === INVALID_CHOICE) {
    return { kind: 'directive', reason: 'invalid' };
  }

  return { kind: 'reaction', emoji: VALID_SUBMISSION_REACTION };
}
