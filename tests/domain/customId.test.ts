import { describe, expect, it } from 'vitest';
import { decodeCustomId, encodeCustomId } from '../../src/discord/interactions/customId';

describe('customId encoding', () => {
  it('encodes and decodes a judge payload', () => {
    const customId = encodeCustomId({
      feature: 'judge',
      action: 'select',
      payload: { u: '200', s: '1100', p: '0' }
    });

    expect(customId.startsWith('hb|1|judge|select|')).toBe(true);

    const decoded = decodeCustomId(customId);
    expect(decoded.feature).toBe('judge');
    expect(decoded.action).toBe('select');
    expect(decoded.payload).toEqual({ u: '200', s: '1100', p: '0' });
  });

  it('fits full-length snowflakes into the component limit', () => {
    const customId = encodeCustomId({
      feature: 'judge',
      action: 'select',
      payload: { u: '1234567890123456789', s: '9876543210987654321', p: '3' }
    });

    expect(customId.length).toBeLessThanOrEqual(100);
  });

  it('defaults to an empty payload', () => {
    expect(decodeCustomId('hb|1|judge|unclear|').payload).toEqual({});
  });

  it('rejects foreign and malformed ids', () => {
    expect(() => decodeCustomId('plain-button')).toThrow('Invalid customId format');
    expect(() => decodeCustomId('xx|1|judge|select|')).toThrow();
    expect(() => decodeCustomId('hb|2|judge|select|')).toThrow();
  });

  it('refuses to encode ids longer than 100 characters', () => {
    expect(() =>
      encodeCustomId({ feature: 'judge', action: 'select', payload: { s: 'x'.repeat(120) } }),
    ).toThrow(/customId too long/);
  });
});
