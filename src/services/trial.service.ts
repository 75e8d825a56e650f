import logger from '../config/logger';
import { storeCall, transportCall } from '../common/functions';
import { trialWarningText } from '../templates/messages';
import type { ChannelTransport } from '../channels/channel.types';
import type { RecordStore } from '../types/store.types';
import type { Owner } from '../types/relay.types';
import type { PolicyService } from './policy.service';

export interface TrialStatus {
  startedAt: Date;
  endsAt: Date;
  daysRemaining: number;
  expired: boolean;
}

export interface TrialNoticeResult {
  notified: number;
  failed: number;
}

export interface TrialServiceDeps {
  store: RecordStore;
  policy: PolicyService;
  /** Picks the bot an owner is reachable on. */
  selectTransport: (owner: Owner) => ChannelTransport;
  timeouts: { storeMs: number; transportMs: number };
}

export class TrialService {
  constructor(private readonly deps: TrialServiceDeps) {}

  // null for shared owners, which have no trial
  getTrialStatus(owner: Owner, now: Date): TrialStatus | null {
    if (owner.mode.kind !== 'dedicatedChannel') {
      return null;
    }
    const { policy } = this.deps;
    const trial = owner.mode.trial;
    return {
      startedAt: trial.startedAt,
      endsAt: policy.trialEndsAt(trial),
      daysRemaining: policy.trialDaysRemaining(trial, now),
      expired: !policy.evaluateTrial(trial, now).allowed
    };
  }

  // Warns dedicated owners 7 days and 1 day before their trial ends
  async notifyExpiringTrials(now: Date = new Date()): Promise<TrialNoticeResult> {
    const { store, selectTransport, timeouts } = this.deps;
    const owners = await storeCall(store.listActiveDedicatedOwners(), timeouts.storeMs, 'listActiveDedicatedOwners');
    const result: TrialNoticeResult = { notified: 0, failed: 0 };

    for (const owner of owners) {
      const status = this.getTrialStatus(owner, now);
      if (!status || status.expired) {
        continue;
      }
      const text = trialWarningText(status.daysRemaining);
      if (!text) {
        continue;
      }

      try {
        await transportCall(selectTransport(owner).send(owner.id, text), timeouts.transportMs, 'Trial warning');
        result.notified++;
      } catch (error) {
        result.failed++;
        logger.error({ err: error, ownerId: owner.id }, 'Failed to send trial notification');
      }
    }

    logger.info(result, 'Trial warnings sent');
    return result;
  }
}
