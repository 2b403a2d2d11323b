import {
  ChannelType,
  DiscordAPIError,
  MessageFlags,
  RESTJSONErrorCodes,
  ThreadAutoArchiveDuration,
  type Client,
  type Message,
  type MessageCreateOptions,
  type SendableChannels
} from 'discord.js';
import type {
  ChatTarget,
  ChatTransport,
  CloseTopicResult,
  DeliveryOptions,
  JudgingPrompt,
  MediaRef,
  SentMessageRef
} from '../app/ports/chatTransport';
import { ExternalTransportError, isDomainError } from '../domain/errors';
import { t, type AppLocale } from '../i18n';
import { logger } from '../lib/logger';
import { buildJudgingPromptRows } from './interactions/components';

const THREAD_NAME_LIMIT = 100;

function isUnknownChannelError(error: unknown): boolean {
  return error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownChannel;
}

/** Discord implementation of the outbound chat port. */
export class DiscordChatTransport implements ChatTransport {
  constructor(
    private readonly client: Client,
    private readonly judgeLocale: AppLocale = 'en',
  ) {}

  async downloadMedia(media: MediaRef): Promise<Buffer> {
    return this.wrap('download_media', async () => {
      const response = await fetch(media.url);
      if (!response.ok) {
        throw new Error(`Attachment download failed with HTTP ${response.status}`);
      }

      return Buffer.from(await response.arrayBuffer());
    });
  }

  async sendMessage(target: ChatTarget, text: string, options: DeliveryOptions = {}): Promise<SentMessageRef> {
    return this.wrap('send_message', async () => {
      const channel = await this.resolveSendable(target, options.threadId);
      const sent = await channel.send({ content: text, ...this.deliveryOptions(options) });
      return { messageId: sent.id };
    });
  }

  async forwardMessage(
    target: ChatTarget,
    source: { userId: string; messageId: string },
    options: DeliveryOptions = {},
  ): Promise<SentMessageRef> {
    return this.wrap('forward_message', async () => {
      const [message, channel] = await Promise.all([
        this.fetchDirectMessage(source.userId, source.messageId),
        this.resolveSendable(target, options.threadId)
      ]);
      const forwarded = await message.forward(channel);
      return { messageId: forwarded.id };
    });
  }

  async sendJudgingPrompt(target: ChatTarget, prompt: JudgingPrompt, options: DeliveryOptions = {}): Promise<SentMessageRef> {
    return this.wrap('send_judging_prompt', async () => {
      const channel = await this.resolveSendable(target, options.threadId);
      const sent = await channel.send({
        content: t(this.judgeLocale, 'judge.prompt'),
        components: buildJudgingPromptRows(prompt, this.judgeLocale),
        ...this.deliveryOptions(options)
      });
      return { messageId: sent.id };
    });
  }

  async createTopic(target: ChatTarget, name: string): Promise<string> {
    return this.wrap('create_topic', async () => {
      if (target.kind !== 'channel') {
        throw new Error('Team channels can only be created inside a guild channel');
      }

      const parent = await this.client.channels.fetch(target.channelId);
      if (!parent || parent.type !== ChannelType.GuildText) {
        throw new Error(`Channel ${target.channelId} is not a guild text channel`);
      }

      const thread = await parent.threads.create({
        name: name.slice(0, THREAD_NAME_LIMIT),
        autoArchiveDuration: ThreadAutoArchiveDuration.OneWeek,
        reason: `Team channel for ${name}`
      });

      logger.info({ feature: 'discord.transport', action: 'create_topic', team: name, thread_id: thread.id }, 'Team thread created');
      return thread.id;
    });
  }

  async closeTopic(_target: ChatTarget, topicId: string): Promise<CloseTopicResult> {
    return this.wrap('close_topic', async () => {
      const channel = await this.client.channels.fetch(topicId).catch((error: unknown) => {
        if (isUnknownChannelError(error)) {
          return null;
        }
        throw error;
      });

      if (!channel?.isThread() || channel.archived) {
        return 'already_closed';
      }

      await channel.setLocked(true, 'Team no longer exists');
      await channel.setArchived(true, 'Team no longer exists');
      return 'closed';
    });
  }

  async setReaction(userId: string, messageId: string, emoji: string | null): Promise<void> {
    await this.wrap('set_reaction', async () => {
      const message = await this.fetchDirectMessage(userId, messageId);

      if (emoji !== null) {
        await message.react(emoji);
        return;
      }

      await Promise.all(
        message.reactions.cache.filter((reaction) => reaction.me).map((reaction) => reaction.users.remove()),
      );
    });
  }

  private deliveryOptions(options: DeliveryOptions): Pick<MessageCreateOptions, 'flags' | 'reply'> {
    const result: Pick<MessageCreateOptions, 'flags' | 'reply'> = {};
    if (options.silent) {
      result.flags = MessageFlags.SuppressNotifications;
    }
    if (options.replyToMessageId) {
      result.reply = { messageReference: options.replyToMessageId, failIfNotExists: false };
    }
    return result;
  }

  private async resolveSendable(target: ChatTarget, threadId?: string | null): Promise<SendableChannels> {
    if (target.kind === 'user') {
      const user = await this.client.users.fetch(target.userId);
      return user.createDM();
    }

    const channelId = threadId ?? target.channelId;
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new Error(`Channel ${channelId} does not accept messages`);
    }

    return channel;
  }

  private async fetchDirectMessage(userId: string, messageId: string): Promise<Message> {
    const user = await this.client.users.fetch(userId);
    const dm = await user.createDM();
    return dm.messages.fetch(messageId);
  }

  private async wrap<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isDomainError(error)) {
        throw error;
      }

      throw new ExternalTransportError(`Discord ${operation} failed`, operation, { cause: error });
    }
  }
}
