import logger from '../config/logger';
import { DAY_MS } from '../common/constants';
import { errorMessage } from '../common/errors';
import { storeCall } from '../common/functions';
import type { RecordStore } from '../types/store.types';

export interface CleanupResult {
  messagesDeleted: number;
  errors: string[];
}

export interface CleanupStats {
  retentionDays: number;
  retentionDate: string;
  nextCleanup: string;
}

export interface CleanupServiceDeps {
  store: RecordStore;
  retentionDays: number;
  timeZone: string;
  storeTimeoutMs: number;
}

// Only messages age out; users, owners and conversations are kept
export class CleanupService {
  constructor(private readonly deps: CleanupServiceDeps) {}

  async runDailyCleanup(now: Date = new Date()): Promise<CleanupResult> {
    const result: CleanupResult = { messagesDeleted: 0, errors: [] };

    try {
      logger.info('Starting cleanup process...');
      result.messagesDeleted = await storeCall(
        this.deps.store.purgeMessagesOlderThan(this.retentionMs, now),
        this.deps.storeTimeoutMs,
        'purgeMessagesOlderThan'
      );
      logger.info({ messagesDeleted: result.messagesDeleted }, 'Cleanup process completed');
    } catch (error) {
      result.errors.push(`Message cleanup failed: ${errorMessage(error)}`);
      logger.error({ err: error }, 'Error during cleanup');
    }

    return result;
  }

  getRetentionDate(now: Date = new Date()): Date {
    return new Date(now.getTime() - this.retentionMs);
  }

  getCleanupStats(now: Date = new Date()): CleanupStats {
    return {
      retentionDays: this.deps.retentionDays,
      retentionDate: this.getRetentionDate(now).toISOString(),
      nextCleanup: `Daily at 03:00 ${this.deps.timeZone}`
    };
  }

  private get retentionMs(): number {
    return this.deps.retentionDays * DAY_MS;
  }
}
