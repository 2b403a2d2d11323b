import { DomainError, ErrorCodes } from '../../domain/errors';
import type { ParticipantId } from '../../domain/ids';
import { logger } from '../../lib/logger';
import { attempt } from '../policies/bestEffort';
import type { ChatTransport } from '../ports/chatTransport';
import type { HuntStore } from '../ports/huntStore';

export type BroadcastInput = {
  senderId: ParticipantId;
  senderName: string;
  text: string;
};

export type BroadcastResult = {
  delivered: number;
  failed: string[];
};

export async function broadcast(
  deps: { store: HuntStore; transport: ChatTransport; maintainerIds: ReadonlySet<string> },
  input: BroadcastInput,
): Promise<BroadcastResult> {
  const text = input.text.trim();
  if (text.length === 0) {
    throw new DomainError('Broadcast text must not be empty', ErrorCodes.EmptyInput);
  }

  const recipients = (await deps.store.listParticipants()).filter((participant) => participant.id !== input.senderId);
  const result: BroadcastResult = { delivered: 0, failed: [] };

  for (const recipient of recipients) {
    const target = { kind: 'user', userId: recipient.id } as const;
    const sent = await attempt(
      'broadcast.deliver',
      async () => {
        if (deps.maintainerIds.has(recipient.id)) {
          await deps.transport.sendMessage(target, `Broadcast from ${input.senderName}`);
        }
        await deps.transport.sendMessage(target, text);
      },
      { participant_id: recipient.id },
    );

    if (sent.ok) {
      result.delivered += 1;
    } else {
      result.failed.push(recipient.id);
    }
  }

  logger.info(
    { feature: 'broadcast', sender_id: input.senderId, delivered: result.delivered, failed: result.failed.length },
    'Broadcast finished',
  );

  return result;
}
