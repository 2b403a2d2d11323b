import type { Challenge, MediaType } from '../../domain/hunt/model';

export type ChatTarget =
  | { kind: 'channel'; channelId: string }
  | { kind: 'user'; userId: string };

export type DeliveryOptions = {
  threadId?: string | null;
  silent?: boolean;
  replyToMessageId?: string | null;
};

export type SentMessageRef = {
  messageId: string;
};

export type MediaRef = {
  type: MediaType;
  url: string;
  fileName: string;
};

export type JudgingPrompt = {
  participantId: string;
  submissionId: string;
  challenges: readonly Challenge[];
};

export type CloseTopicResult = 'closed' | 'already_closed';

/**
 * Outbound chat operations the core needs. Implementations throw
 * `ExternalTransportError` when the platform call fails.
 */
export interface ChatTransport {
  downloadMedia(media: MediaRef): Promise<Buffer>;
  sendMessage(target: ChatTarget, text: string, options?: DeliveryOptions): Promise<SentMessageRef>;
  forwardMessage(
    target: ChatTarget,
    source: { userId: string; messageId: string },
    options?: DeliveryOptions,
  ): Promise<SentMessageRef>;
  sendJudgingPrompt(target: ChatTarget, prompt: JudgingPrompt, options?: DeliveryOptions): Promise<SentMessageRef>;
  createTopic(target: ChatTarget, name: string): Promise<string>;
  closeTopic(target: ChatTarget, topicId: string): Promise<CloseTopicResult>;
  // `null` clears the bot's reactions on the message.
  setReaction(userId: string, messageId: string, emoji: string | null): Promise<void>;
}
