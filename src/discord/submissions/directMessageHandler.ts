import type { HuntCore } from '../../app/huntCore';
import type { MediaRef } from '../../app/ports/chatTransport';
import { classifySmallTalk, type SmallTalkReply } from '../../domain/hunt/smallTalk';
import type { I18nKey } from '../../i18n';
import { captureException } from '../../infra/sentry/sentry';
import { createCorrelationId, runWithCorrelation } from '../../lib/correlation';
import { logger } from '../../lib/logger';
import { formatUserFacingError } from '../featureErrors';
import { createTranslator, type Translator } from '../locale';

export type AttachmentLike = {
  name: string;
  url: string;
  contentType: string | null;
};

/** The part of a discord.js `Message` the intake reads. */
export type DirectMessageLike = {
  id: string;
  guildId: string | null;
  content: string;
  author: { id: string; bot: boolean };
  attachments: { values(): Iterable<AttachmentLike> };
  reply(content: string): Promise<unknown>;
};

const smallTalkKeys: Record<SmallTalkReply, I18nKey> = {
  beer: 'dm.beer',
  cheers: 'dm.cheers',
  greeting: 'dm.greeting',
  unknown: 'dm.unknown'
};

export function toMediaRef(attachment: AttachmentLike): MediaRef | null {
  const contentType = attachment.contentType?.toLowerCase() ?? '';
  if (contentType.startsWith('image/')) {
    return { type: 'photo', url: attachment.url, fileName: attachment.name };
  }

  if (contentType.startsWith('video/')) {
    return { type: 'video', url: attachment.url, fileName: attachment.name };
  }

  return null;
}

async function submitMedia(
  core: Pick<HuntCore, 'submit'>,
  message: DirectMessageLike,
  media: MediaRef,
  tr: Translator,
): Promise<void> {
  try {
    const result = await core.submit({
      userId: message.author.id,
      messageId: message.id,
      media,
      caption: message.content
    });

    logger.info(
      {
        feature: 'submission',
        action: 'received',
        submission_id: result.submission.id,
        duplicate: result.duplicate,
        routed_channel: result.channelId,
        failed_steps: result.delivery.filter((step) => !step.ok).map((step) => step.step)
      },
      'Submission received',
    );
    await message.reply(tr.t('submission.received'));
  } catch (error) {
    const userError = formatUserFacingError(tr, error);
    if (userError) {
      logger.info({ feature: 'submission', error }, 'Submission rejected');
      await message.reply(userError);
      return;
    }

    logger.error({ feature: 'submission', error }, 'Submission failed');
    captureException(error, { feature: 'submission' });
    await message.reply(tr.t('error.command_failed'));
  }
}

/**
 * Intake for messages sent to the bot in a DM: the first photo or video is a
 * submission, plain text gets a short reply, anything else is refused.
 */
export async function handleDirectMessage(
  core: Pick<HuntCore, 'submit'>,
  message: DirectMessageLike,
): Promise<void> {
  if (message.author.bot || message.guildId !== null) {
    return;
  }

  await runWithCorrelation({ correlationId: createCorrelationId(), source: 'direct_message' }, async () => {
    const tr = createTranslator('en');
    const attachments = [...message.attachments.values()];

    if (attachments.length > 0) {
      const media = attachments.map(toMediaRef).find((ref): ref is MediaRef => ref !== null);
      if (!media) {
        await message.reply(tr.t('dm.unsupported'));
        return;
      }

      if (attachments.length > 1) {
        logger.info(
          { feature: 'submission', message_id: message.id, attachment_count: attachments.length },
          'Only the first photo or video of a message is submitted',
        );
      }

      await submitMedia(core, message, media, tr);
      return;
    }

    if (message.content.trim().length === 0) {
      await message.reply(tr.t('dm.unsupported'));
      return;
    }

    await message.reply(tr.t(smallTalkKeys[classifySmallTalk(message.content)]));
  });
}
