import { setTimeout as sleep } from 'node:timers/promises';
import logger from '../config/logger';
import { ENUM_BROADCAST_TARGETS } from '../common/constants';
import type { BroadcastTarget } from '../common/constants';
import { asTransportError } from '../common/errors';
import { storeCall, transportCall } from '../common/functions';
import type { ChannelTransport } from '../channels/channel.types';
import type { RecordStore } from '../types/store.types';

export interface BroadcastResult {
  target: BroadcastTarget;
  recipients: number;
  sent: number;
  blocked: number;
  failed: number;
}

export interface BroadcastServiceDeps {
  store: RecordStore;
  frontDoor: ChannelTransport;
  timeouts: { storeMs: number; transportMs: number };
  /** Pause between sends to stay under the Bot API rate limit. */
  pauseMs?: number;
}

export class BroadcastService {
  constructor(private readonly deps: BroadcastServiceDeps) {}

  static isTarget(value: unknown): value is BroadcastTarget {
    return Object.values(ENUM_BROADCAST_TARGETS).some((target) => target === value);
  }

  async recipients(target: BroadcastTarget): Promise<number[]> {
    const { store, timeouts } = this.deps;
    const ownerIds = async () =>
      (await storeCall(store.listOwners(), timeouts.storeMs, 'listOwners'))
        .filter((owner) => owner.isActive)
        .map((owner) => owner.id);

    switch (target) {
      case ENUM_BROADCAST_TARGETS.OWNERS:
        return ownerIds();
      case ENUM_BROADCAST_TARGETS.USERS:
        return storeCall(store.listUserIds(), timeouts.storeMs, 'listUserIds');
      case ENUM_BROADCAST_TARGETS.DEDICATED_USERS:
        return storeCall(store.listDedicatedUserIds(), timeouts.storeMs, 'listDedicatedUserIds');
      case ENUM_BROADCAST_TARGETS.ALL: {
        const users = await storeCall(store.listUserIds(), timeouts.storeMs, 'listUserIds');
        return [...new Set([...(await ownerIds()), ...users])];
      }
    }
  }

  async broadcast(target: BroadcastTarget, text: string): Promise<BroadcastResult> {
    const { frontDoor, timeouts, pauseMs = 50 } = this.deps;
    const recipients = await this.recipients(target);
    const result: BroadcastResult = { target, recipients: recipients.length, sent: 0, blocked: 0, failed: 0 };

    for (const [index, chatId] of recipients.entries()) {
      if (index > 0 && pauseMs > 0) {
        await sleep(pauseMs);
      }
      try {
        await transportCall(frontDoor.send(chatId, text), timeouts.transportMs, 'Broadcast');
        result.sent++;
      } catch (error) {
        const failure = asTransportError(error);
        if (failure.kind === 'Blocked') {
          result.blocked++;
        } else {
          result.failed++;
          logger.warn({ err: failure, chatId }, 'Broadcast send failed');
        }
      }
    }

    logger.info(result, 'Broadcast finished');
    return result;
  }
}
