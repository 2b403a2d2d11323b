import { describe, expect, it } from 'vitest';
import { createTestCore, join } from '../support/testCore';

describe('broadcast', () => {
  it('sends the text to everyone but the sender and flags maintainers', async () => {
    const { core, transport } = createTestCore({ maintainerIds: ['maint-1'] });
    await join(core, '200', 'Alpha', 'Alice');
    await join(core, 'maint-1', 'Beta', 'Mara');
    await join(core, '201', 'Gamma', 'Bob');

    const result = await core.broadcast({ senderId: '200', senderName: 'Alice', text: '  Meet at the fountain  ' });

    expect(result).toEqual({ delivered: 2, failed: [] });
    expect(transport.callsOf('sendMessage').map((call) => [call.target, call.text])).toEqual([
      [{ kind: 'user', userId: 'maint-1' }, 'Broadcast from Alice'],
      [{ kind: 'user', userId: 'maint-1' }, 'Meet at the fountain'],
      [{ kind: 'user', userId: '201' }, 'Meet at the fountain']
    ]);
  });

  it('rejects empty text', async () => {
    const { core, transport } = createTestCore();
    await join(core, '200', 'Alpha');

    await expect(core.broadcast({ senderId: 'maint-1', senderName: 'Mara', text: '   ' })).rejects.toMatchObject({
      code: 'EMPTY_INPUT'
    });
    expect(transport.calls).toEqual([]);
  });

  it('counts undeliverable recipients', async () => {
    const { core, transport } = createTestCore();
    await join(core, '200', 'Alpha');
    await join(core, '201', 'Beta');
    transport.failOn('sendMessage');

    const result = await core.broadcast({ senderId: 'maint-1', senderName: 'Mara', text: 'hello' });

    expect(result).toEqual({ delivered: 0, failed: ['200', '201'] });
  });
});
