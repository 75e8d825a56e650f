import { describe, expect, it } from 'vitest';
import { BroadcastService } from './broadcast.service';
import { TransportError } from '../common/errors';
import { FakeTransport } from '../__fixtures__/fakeTransport';
import { MemoryRecordStore } from '../__fixtures__/memoryRecordStore';
import { dedicatedOwner, seedOwner, sharedOwner, testTimeouts } from '../__fixtures__/owners';

const setup = async () => {
  const store = new MemoryRecordStore();
  seedOwner(store, sharedOwner(20));
  seedOwner(store, sharedOwner(21, { isActive: false }));
  seedOwner(store, dedicatedOwner(22, new Date('2026-03-01T00:00:00Z')));
  await store.upsertUser(10, 'User A');
  await store.upsertUser(20, 'Owner 20');
  await store.upsertUser(11, 'User B');
  await store.getOrCreateConversation(11, 22);

  const frontDoor = new FakeTransport();
  const broadcasts = new BroadcastService({ store, frontDoor, timeouts: testTimeouts, pauseMs: 0 });
  return { store, frontDoor, broadcasts };
};

describe('BroadcastService', () => {
  it('resolves each audience', async () => {
    const { broadcasts } = await setup();

    expect(await broadcasts.recipients('owners')).toEqual([20, 22]);
    expect(await broadcasts.recipients('users')).toEqual([10, 20, 11]);
    expect(await broadcasts.recipients('dedicated_users')).toEqual([11]);
    expect(await broadcasts.recipients('all')).toEqual([20, 22, 10, 11]);
  });

  it('counts blocked recipients apart from other failures', async () => {
    const { frontDoor, broadcasts } = await setup();
    const send = frontDoor.send.bind(frontDoor);
    frontDoor.send = async (chatId, text) => {
      if (chatId === 11) throw new TransportError('Blocked', 'bot was blocked by the user');
      if (chatId === 22) throw new Error('socket hang up');
      return send(chatId, text);
    };

    expect(await broadcasts.broadcast('all', 'Maintenance tonight')).toEqual({
      target: 'all',
      recipients: 4,
      sent: 2,
      blocked: 1,
      failed: 1
    });
    expect(frontDoor.sent.map((s) => s.chatId)).toEqual([20, 10]);
  });

  it('validates targets', () => {
    expect(BroadcastService.isTarget('dedicated_users')).toBe(true);
    expect(BroadcastService.isTarget('everyone')).toBe(false);
  });
});
