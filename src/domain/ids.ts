export type Brand<T, Name extends string> = T & { readonly __brand: Name };

export type ParticipantId = Brand<string, 'ParticipantId'>;
export type SubmissionId = Brand<string, 'SubmissionId'>;
export type ChannelId = Brand<string, 'ChannelId'>;

export function asParticipantId(value: string): ParticipantId {
  return value as ParticipantId;
}

export function asSubmissionId(value: string): SubmissionId {
  return value as SubmissionId;
}

export function asChannelId(value: string): ChannelId {
  return value as ChannelId;
}
