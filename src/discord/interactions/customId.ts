import { z } from 'zod';

const CUSTOM_ID_PREFIX = 'hb';
const CUSTOM_ID_VERSION = '1';
const CUSTOM_ID_MAX_LENGTH = 100;

const payloadSchema = z.record(z.string(), z.string());

const envelopeSchema = z.object({
  prefix: z.literal(CUSTOM_ID_PREFIX),
  version: z.literal(CUSTOM_ID_VERSION),
  feature: z.string().min(1).max(24),
  action: z.string().min(1).max(24),
  payload: payloadSchema.default({})
});

export type CustomIdEnvelope = z.infer<typeof envelopeSchema>;

function base64UrlEncode(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64url');
}

function base64UrlDecode(value: string): string {
  return Buffer.from(value, 'base64url').toString('utf8');
}

export function encodeCustomId(input: {
  feature: string;
  action: string;
  payload?: Record<string, string>;
}): string {
  const payload = input.payload ?? {};
  const encodedPayload = base64UrlEncode(JSON.stringify(payload));
  const candidate = [CUSTOM_ID_PREFIX, CUSTOM_ID_VERSION, input.feature, input.action, encodedPayload].join('|');

  if (candidate.length > CUSTOM_ID_MAX_LENGTH) {
    throw new Error(`customId too long: ${candidate.length} characters`);
  }

  return candidate;
}

export function decodeCustomId(customId: string): CustomIdEnvelope {
  const parts = customId.split('|');
  if (parts.length !== 5) {
    throw new Error('Invalid customId format');
  }

  const [prefix, version, feature, action, encodedPayload] = parts;
  let payload: Record<string, string> = {};

  if (encodedPayload) {
    const parsed: unknown = JSON.parse(base64UrlDecode(encodedPayload));
    payload = payloadSchema.parse(parsed);
  }

  return envelopeSchema.parse({
    prefix,
    version,
    feature,
    action,
    payload
  });
}
