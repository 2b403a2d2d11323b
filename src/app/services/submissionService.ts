import { DomainError, ErrorCodes, ExternalTransportError, StoreError, isDomainError } from '../../domain/errors';
import type { Challenge, SubmissionView } from '../../domain/hunt/model';
import { archiveFileName, renderSubmissionSummary } from '../../domain/hunt/submissionSummary';
import type { ParticipantId, SubmissionId } from '../../domain/ids';
import { logger } from '../../lib/logger';
import { attempt, failedSteps, type BestEffort } from '../policies/bestEffort';
import type { ChatTarget, ChatTransport, MediaRef } from '../ports/chatTransport';
import type { HuntStore, InsertedSubmission, InsertSubmissionInput } from '../ports/huntStore';
import type { MediaArchive } from '../ports/mediaArchive';
import type { SubmissionGate } from './submissionGate';
import type { TopologySynchronizer } from './topologyService';

export type SubmissionDeps = {
  store: HuntStore;
  transport: ChatTransport;
  archive: MediaArchive;
  gate: SubmissionGate;
  topology: Pick<TopologySynchronizer, 'lookupChannel'>;
  judgeChannelId: string;
  timeZone: string;
};

export type SubmitMediaInput = {
  participantId: ParticipantId;
  messageId: SubmissionId;
  media: MediaRef;
  caption: string;
};

export type SubmitMediaResult = {
  submission: SubmissionView;
  // The message id was already on file; nothing was downloaded, stored or routed again.
  duplicate: boolean;
  channelId: string | null;
  remainingChallenges: Challenge[] | null;
  delivery: Array<BestEffort<unknown>>;
};

function asTransportError(error: unknown, operation: string): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  return new ExternalTransportError(`Chat transport failed during ${operation}`, operation, { cause: error });
}

async function insertSubmissionOrFail(
  store: HuntStore,
  row: InsertSubmissionInput,
): Promise<InsertedSubmission> {
  let inserted: InsertedSubmission | null;
  try {
    inserted = await store.insertSubmission(row);
  } catch (error) {
    throw new StoreError('Failed to insert submission', 'insert_submission', { cause: error });
  }

  if (!inserted) {
    throw new DomainError('Participant has not joined a team', ErrorCodes.NotRegistered);
  }

  return inserted;
}

function duplicateResult(submission: SubmissionView): SubmitMediaResult {
  logger.info(
    { feature: 'submission', action: 'duplicate', submission_id: submission.id, team: submission.team },
    'Submission already on file; skipping intake',
  );
  return { submission, duplicate: true, channelId: null, remainingChallenges: null, delivery: [] };
}

/**
 * Accepts one media proof. Everything up to the submission insert is fatal
 * for the request; routing to the judges afterwards is best-effort and never
 * rolls the insert back.
 */
export async function submitMedia(deps: SubmissionDeps, input: SubmitMediaInput): Promise<SubmitMediaResult> {
  if (!deps.gate.isEnabled()) {
    throw new DomainError('Submissions are currently disabled', ErrorCodes.SubmissionsDisabled);
  }

  const participant = await deps.store.getParticipant(input.participantId);
  if (!participant) {
    throw new DomainError('Participant has not joined a team', ErrorCodes.NotRegistered);
  }

  const known = await deps.store.getSubmissionView(input.messageId);
  if (known) {
    return duplicateResult(known);
  }

  let bytes: Buffer;
  try {
    bytes = await deps.transport.downloadMedia(input.media);
  } catch (error) {
    throw asTransportError(error, 'download_media');
  }

  let mediaPath: string;
  try {
    mediaPath = await deps.archive.save(archiveFileName(input.messageId, input.media.fileName), bytes);
  } catch (error) {
    throw new StoreError('Failed to archive submission media', 'archive_media', { cause: error });
  }

  const { submission: inserted, created } = await insertSubmissionOrFail(deps.store, {
    id: input.messageId,
    participantId: input.participantId,
    caption: input.caption,
    mediaType: input.media.type,
    mediaPath
  });

  if (!created) {
    return duplicateResult({ ...inserted, username: participant.username, displayName: participant.displayName });
  }

  logger.info(
    {
      feature: 'submission',
      action: 'accepted',
      submission_id: inserted.id,
      participant_id: inserted.participantId,
      team: inserted.team,
      media_type: inserted.mediaType
    },
    'Submission stored',
  );

  const context = { submission_id: inserted.id, team: inserted.team };
  const delivery: Array<BestEffort<unknown>> = [];
  const judgeTarget: ChatTarget = { kind: 'channel', channelId: deps.judgeChannelId };

  const reread = await attempt('reread_submission', () => deps.store.getSubmissionView(inserted.id), context);
  delivery.push(reread);
  const submission: SubmissionView = (reread.ok ? reread.value : null) ?? {
    ...inserted,
    username: participant.username,
    displayName: participant.displayName
  };

  const lookup = await attempt('lookup_channel', () => deps.topology.lookupChannel(submission.team), context);
  delivery.push(lookup);
  const channelId = lookup.ok ? lookup.value : null;
  if (!channelId) {
    logger.warn({ feature: 'submission', action: 'route', ...context }, 'No open team channel; routing un-threaded');
  }

  const forwarded = await attempt(
    'forward_media',
    () =>
      deps.transport.forwardMessage(
        judgeTarget,
        { userId: submission.participantId, messageId: submission.id },
        { threadId: channelId },
      ),
    context,
  );
  delivery.push(forwarded);

  delivery.push(
    await attempt(
      'post_summary',
      () =>
        deps.transport.sendMessage(judgeTarget, renderSubmissionSummary(submission, deps.timeZone), {
          threadId: channelId,
          silent: true,
          replyToMessageId: forwarded.ok ? forwarded.value.messageId : null
        }),
      context,
    ),
  );

  const remaining = await attempt(
    'list_remaining_challenges',
    () => deps.store.listRemainingChallenges(submission.participantId),
    context,
  );
  delivery.push(remaining);
  const remainingChallenges = remaining.ok ? remaining.value : null;

  if (remainingChallenges) {
    delivery.push(
      await attempt(
        'post_judging_prompt',
        () =>
          deps.transport.sendJudgingPrompt(
            judgeTarget,
            {
              participantId: submission.participantId,
              submissionId: submission.id,
              challenges: remainingChallenges
            },
            { threadId: channelId, silent: true },
          ),
        context,
      ),
    );
  }

  const failed = failedSteps(delivery);
  if (failed.length > 0) {
    await attempt(
      'report_routing_failure',
      () =>
        deps.transport.sendMessage(
          judgeTarget,
          `Routing of submission ${submission.id} (team ${submission.team}) failed at: ${failed.join(', ')}. ` +
            `Judge it with /hunt-admin judge.`,
        ),
      context,
    );
  }

  return { submission, duplicate: false, channelId, remainingChallenges, delivery };
}
