import { describe, expect, it } from 'vitest';
import { CleanupService } from './cleanup.service';
import { MemoryRecordStore } from '../__fixtures__/memoryRecordStore';

const NOW = new Date('2026-03-15T03:00:00Z');

const setup = () => {
  let current = new Date('2026-01-01T00:00:00Z');
  const store = new MemoryRecordStore(() => current);
  const cleanup = new CleanupService({ store, retentionDays: 72, timeZone: 'UTC', storeTimeoutMs: 1000 });
  const at = (iso: string) => {
    current = new Date(iso);
  };
  return { store, cleanup, at };
};

describe('CleanupService', () => {
  it('deletes messages older than the retention period', async () => {
    const { store, cleanup, at } = setup();
    const conversation = await store.getOrCreateConversation(10, 20);
    await store.appendMessage(conversation.id, 'user', 'old', 'text', 1);
    at('2026-03-10T00:00:00Z');
    await store.appendMessage(conversation.id, 'user', 'recent', 'text', 2);

    expect(await cleanup.runDailyCleanup(NOW)).toEqual({ messagesDeleted: 1, errors: [] });
    expect(store.messages.map((m) => m.text)).toEqual(['recent']);
    expect(store.conversations).toHaveLength(1);
  });

  it('reports a failed purge instead of throwing', async () => {
    const { store, cleanup } = setup();
    store.purgeMessagesOlderThan = async () => {
      throw new Error('lock wait timeout');
    };

    expect(await cleanup.runDailyCleanup(NOW)).toEqual({
      messagesDeleted: 0,
      errors: ['Message cleanup failed: lock wait timeout']
    });
  });

  it('describes the retention settings', () => {
    const { cleanup } = setup();
    expect(cleanup.getCleanupStats(NOW)).toEqual({
      retentionDays: 72,
      retentionDate: '2026-01-02T03:00:00.000Z',
      nextCleanup: 'Daily at 03:00 UTC'
    });
  });
});
