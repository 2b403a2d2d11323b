import { DomainError, ErrorCodes, StoreError } from '../../domain/errors';
import {
  computeJudgementOutcome,
  isSentinelChoice,
  planSubmitterFeedback,
  sentinelChallenge
} from '../../domain/hunt/judgement';
import type { Challenge, Judgement, Participant } from '../../domain/hunt/model';
import type { ParticipantId, SubmissionId } from '../../domain/ids';
import { t, type AppLocale } from '../../i18n';
import { logger } from '../../lib/logger';
import { attempt, type BestEffort } from '../policies/bestEffort';
import type { ChatTransport } from '../ports/chatTransport';
import type { HuntStore } from '../ports/huntStore';

export type JudgementDeps = {
  store: HuntStore;
  transport: ChatTransport;
  feedbackLocale?: AppLocale;
};

export type JudgeSubmissionInput = {
  submissionId: SubmissionId;
  choice: string;
  judgedBy: string | null;
  // Submitter id carried by the judging prompt; the stored owner always wins.
  participantId?: ParticipantId;
};

export type JudgeSubmissionResult = {
  judgement: Judgement;
  owner: Participant;
  challenge: Challenge;
  feedback: Array<BestEffort<unknown>>;
};

async function resolveChallenge(store: HuntStore, choice: string): Promise<Challenge | null> {
  if (isSentinelChoice(choice)) {
    return sentinelChallenge(choice);
  }

  return store.findChallenge(choice);
}

/**
 * Records (or overwrites) the single judgement for a submission, then tells
 * the submitter. Submission lookup failures take precedence over unknown
 * challenges.
 */
export async function judgeSubmission(deps: JudgementDeps, input: JudgeSubmissionInput): Promise<JudgeSubmissionResult> {
  const choice = input.choice.trim();

  const owner = await deps.store.getSubmissionOwner(input.submissionId);
  if (!owner) {
    throw new DomainError(`Submission ${input.submissionId} not found`, ErrorCodes.SubmissionNotFound);
  }

  const challenge = await resolveChallenge(deps.store, choice);
  if (!challenge) {
    throw new DomainError(`Challenge ${choice} not found`, ErrorCodes.ChallengeNotFound);
  }

  if (input.participantId && input.participantId !== owner.id) {
    logger.warn(
      {
        feature: 'judgement',
        submission_id: input.submissionId,
        prompt_participant_id: input.participantId,
        owner_id: owner.id
      },
      'Judging prompt names a different submitter than the stored owner',
    );
  }

  const outcome = computeJudgementOutcome(challenge.name);

  let judgement: Judgement;
  try {
    judgement = await deps.store.upsertJudgement({
      submissionId: input.submissionId,
      challengeName: challenge.name,
      points: outcome.points,
      valid: outcome.valid,
      judgedBy: input.judgedBy
    });
  } catch (error) {
    throw new StoreError('Failed to write judgement', 'upsert_judgement', { cause: error });
  }

  logger.info(
    {
      feature: 'judgement',
      action: 'judged',
      submission_id: input.submissionId,
      challenge: challenge.name,
      points: judgement.points,
      valid: judgement.valid,
      judged_by: input.judgedBy
    },
    'Submission judged',
  );

  const feedback = await sendSubmitterFeedback(deps, owner, input.submissionId, challenge.name);
  return { judgement, owner, challenge, feedback };
}

async function sendSubmitterFeedback(
  deps: JudgementDeps,
  owner: Participant,
  submissionId: SubmissionId,
  choice: string,
): Promise<Array<BestEffort<unknown>>> {
  const plan = planSubmitterFeedback(choice);
  const context = { submission_id: submissionId, participant_id: owner.id };
  const locale = deps.feedbackLocale ?? 'en';

  if (plan.kind === 'reaction') {
    return [
      await attempt('react_valid', () => deps.transport.setReaction(owner.id, submissionId, plan.emoji), context)
    ];
  }

  const text = plan.reason === 'unclear' ? t(locale, 'judge.feedback.unclear') : t(locale, 'judge.feedback.invalid');

  // The original message may be gone by now; neither step is fatal.
  const notified = await attempt(
    'notify_submitter',
    () => deps.transport.sendMessage({ kind: 'user', userId: owner.id }, text, { replyToMessageId: submissionId }),
    context,
  );
  const cleared = await attempt('clear_reaction', () => deps.transport.setReaction(owner.id, submissionId, null), context);

  return [notified, cleared];
}
