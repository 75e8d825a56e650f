import logger from '../config/logger';
import { RelayError, asTransportError } from '../common/errors';
import { storeCall, transportCall } from '../common/functions';
import type { ChannelTransport, InboundHandler, TransportFactory } from '../channels/channel.types';
import type { RecordStore } from '../types/store.types';
import type { Owner } from '../types/relay.types';
import type { PolicyService } from './policy.service';
import type { TenantHandle, TenantRegistry } from './tenantRegistry.service';

export interface LifecycleDeps {
  store: RecordStore;
  registry: TenantRegistry;
  policy: PolicyService;
  createTransport: TransportFactory;
  /** Builds the inbound callback for one dedicated transport. */
  bindInbound: (ownerId: number, transport: ChannelTransport) => InboundHandler;
  timeouts: { storeMs: number; transportMs: number };
  clock?: () => Date;
}

export interface StartAllResult {
  started: number;
  failed: number;
}

export interface TrialSweepResult {
  checked: number;
  expired: number;
  newlyExpired: number;
  active: number;
}

export type OwnerActionError = 'OwnerNotFound' | 'TrialExpired' | 'AlreadyRegistered';

export class OwnerActionRejected extends RelayError {
  constructor(public readonly reason: OwnerActionError, ownerId: number) {
    super(`Owner ${ownerId}: ${reason}`);
  }
}

/**
 * Starts and stops dedicated bots. Every transition goes through the
 * registry, so sweeps, admin actions and registrations for the same owner
 * are applied one after another.
 */
export class LifecycleOrchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: LifecycleDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async register(ownerId: number, credential: string): Promise<TenantHandle> {
    const { registry, createTransport, bindInbound, timeouts } = this.deps;

    return registry.replace(ownerId, async () => {
      const transport = createTransport();
      transport.subscribe(bindInbound(ownerId, transport));
      transport.onFailure((error) => {
        logger.warn({ err: error, ownerId }, 'Dedicated transport failed, dropping handle');
        void registry.evict(ownerId, transport).catch((evictError: unknown) => {
          logger.error({ err: evictError, ownerId }, 'Failed to evict crashed tenant');
        });
      });

      try {
        const identity = await transportCall(transport.open(credential), timeouts.transportMs, `Opening bot for owner ${ownerId}`);
        logger.info({ ownerId, bot: identity.username }, 'Dedicated bot started');
        return { ownerId, credential, transport, identity, startedAt: this.clock() };
      } catch (error) {
        await transport.close().catch((closeError: unknown) => {
          logger.warn({ err: closeError, ownerId }, 'Failed to close transport after open failure');
        });
        throw asTransportError(error);
      }
    });
  }

  async deregister(ownerId: number): Promise<boolean> {
    const removed = await this.deps.registry.remove(ownerId);
    if (removed) {
      logger.info({ ownerId }, 'Dedicated bot stopped');
    }
    return removed;
  }

  isEligible(owner: Owner, now: Date = this.clock()): boolean {
    if (owner.mode.kind !== 'dedicatedChannel' || !owner.isActive || owner.mode.credential === null) {
      return false;
    }
    return this.deps.policy.evaluateTrial(owner.mode.trial, now).allowed;
  }

  async startAll(): Promise<StartAllResult> {
    const { store, timeouts } = this.deps;
    const owners = await storeCall(store.listActiveDedicatedOwners(), timeouts.storeMs, 'listActiveDedicatedOwners');
    const now = this.clock();

    const results = await Promise.allSettled(
      owners.map(async (owner) => {
        if (owner.mode.kind !== 'dedicatedChannel' || owner.mode.credential === null) {
          throw new Error('Owner has no dedicated credential');
        }
        if (!this.isEligible(owner, now)) {
          throw new Error('Trial ran out before start');
        }
        return this.register(owner.id, owner.mode.credential);
      })
    );

    let started = 0;
    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        started++;
        return;
      }
      failed++;
      logger.error({ err: result.reason, ownerId: owners[index]?.id }, 'Failed to start dedicated bot');
    });

    logger.info({ started, failed }, 'Dedicated bots started');
    return { started, failed };
  }

  async checkTrials(now: Date = this.clock()): Promise<TrialSweepResult> {
    const { store, policy, timeouts } = this.deps;
    const owners = await storeCall(store.listOwners(), timeouts.storeMs, 'listOwners');
    const result: TrialSweepResult = { checked: 0, expired: 0, newlyExpired: 0, active: 0 };

    for (const owner of owners) {
      if (owner.mode.kind !== 'dedicatedChannel') {
        continue;
      }
      result.checked++;

      const decision = policy.evaluateTrial(owner.mode.trial, now);
      if (decision.allowed) {
        result.active++;
        continue;
      }
      result.expired++;

      try {
        if (decision.freshExpiry && (await storeCall(store.markTrialExpired(owner.id), timeouts.storeMs, 'markTrialExpired'))) {
          result.newlyExpired++;
          logger.info({ ownerId: owner.id }, 'Trial expired');
        }
        // also catches handles left running by an expiry the router recorded
        await this.deregister(owner.id);
      } catch (error) {
        logger.error({ err: error, ownerId: owner.id }, 'Failed to expire trial');
      }
    }

    logger.info(result, 'Trial check completed');
    return result;
  }

  async pause(ownerId: number): Promise<Owner> {
    const { store, timeouts } = this.deps;
    const owner = await storeCall(store.updateOwner(ownerId, { isActive: false }), timeouts.storeMs, 'updateOwner');
    if (!owner) {
      throw new OwnerActionRejected('OwnerNotFound', ownerId);
    }
    await this.deregister(ownerId);
    return owner;
  }

  // Reactivates the owner and restarts its bot when it is still eligible
  async resume(ownerId: number): Promise<{ owner: Owner; running: boolean }> {
    const { store, timeouts } = this.deps;
    const owner = await storeCall(store.updateOwner(ownerId, { isActive: true }), timeouts.storeMs, 'updateOwner');
    if (!owner) {
      throw new OwnerActionRejected('OwnerNotFound', ownerId);
    }
    if (owner.mode.kind === 'dedicatedChannel' && owner.mode.credential !== null && this.isEligible(owner)) {
      await this.register(ownerId, owner.mode.credential);
      return { owner, running: true };
    }
    return { owner, running: this.deps.registry.has(ownerId) };
  }

  /**
   * Switches an owner to a dedicated bot. The credential is proven by
   * opening the bot before anything is persisted; an existing trial start
   * is kept.
   */
  async assignCredential(ownerId: number, credential: string): Promise<{ owner: Owner; handle: TenantHandle }> {
    const { store, timeouts } = this.deps;
    const now = this.clock();
    const existing = await storeCall(store.getOwner(ownerId), timeouts.storeMs, 'getOwner');
    if (!existing) {
      throw new OwnerActionRejected('OwnerNotFound', ownerId);
    }

    const trial = existing.mode.kind === 'dedicatedChannel' ? existing.mode.trial : { startedAt: now, expired: false };
    if (!this.deps.policy.evaluateTrial(trial, now).allowed) {
      throw new OwnerActionRejected('TrialExpired', ownerId);
    }

    const handle = await this.register(ownerId, credential);
    try {
      const owner = await storeCall(
        store.upsertOwner(ownerId, {
          mode: { kind: 'dedicatedChannel', credential, botUsername: handle.identity.username, trial },
          onboardingStep: 'done'
        }),
        timeouts.storeMs,
        'upsertOwner'
      );
      return { owner, handle };
    } catch (error) {
      await this.deregister(ownerId);
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    const closed = await this.deps.registry.closeAll();
    logger.info({ closed }, 'All dedicated bots stopped');
  }
}
