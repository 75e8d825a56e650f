import { describe, expect, it } from 'vitest';
import { LifecycleOrchestrator, OwnerActionRejected } from './lifecycle.service';
import { PolicyService } from './policy.service';
import { TenantRegistry } from './tenantRegistry.service';
import { TransportError } from '../common/errors';
import { FakeTransport } from '../__fixtures__/fakeTransport';
import { MemoryRecordStore } from '../__fixtures__/memoryRecordStore';
import { dedicatedOwner, seedOwner, sharedOwner, testPolicySettings, testTimeouts } from '../__fixtures__/owners';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-03-10T10:00:00Z');

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const setup = () => {
  const store = new MemoryRecordStore(() => NOW);
  const registry = new TenantRegistry({ closeTimeoutMs: 100 });
  const transports: FakeTransport[] = [];
  const rejectedCredentials = new Set<string>();
  const boundOwners: number[] = [];

  const lifecycle = new LifecycleOrchestrator({
    store,
    registry,
    policy: new PolicyService(testPolicySettings),
    createTransport: () => {
      const transport = new FakeTransport();
      const open = transport.open.bind(transport);
      transport.open = async (credential) => {
        if (rejectedCredentials.has(credential)) {
          transport.openError = new TransportError('InvalidCredential', 'Unauthorized');
        }
        return open(credential);
      };
      transports.push(transport);
      return transport;
    },
    bindInbound: (ownerId) => {
      boundOwners.push(ownerId);
      return async () => undefined;
    },
    timeouts: testTimeouts,
    clock: () => NOW
  });

  return { store, registry, lifecycle, transports, rejectedCredentials, boundOwners };
};

const kindOf = (error: unknown) => (error instanceof TransportError ? error.kind : null);
const reasonOf = (error: unknown) => (error instanceof OwnerActionRejected ? error.reason : null);

describe('LifecycleOrchestrator.register / deregister', () => {
  it('opens a subscribed transport and removes it again', async () => {
    const { registry, lifecycle, transports, boundOwners } = setup();

    const handle = await lifecycle.register(20, 'token-20');

    expect(handle.identity.username).toBe('token-20_bot');
    expect(registry.get(20)?.transport).toBe(transports[0]);
    expect(transports[0].subscribed).toBe(true);
    expect(boundOwners).toEqual([20]);

    expect(await lifecycle.deregister(20)).toBe(true);
    expect(transports[0].closeCalls).toBe(1);
    expect(registry.has(20)).toBe(false);
  });

  it('is a no-op to deregister an owner with no bot', async () => {
    const { lifecycle } = setup();
    expect(await lifecycle.deregister(20)).toBe(false);
  });

  it('stops the old bot when a new credential is registered', async () => {
    const { registry, lifecycle, transports } = setup();

    await lifecycle.register(20, 'cred-a');
    await lifecycle.register(20, 'cred-b');

    expect(transports.map((t) => [t.credential, t.closeCalls])).toEqual([
      ['cred-a', 1],
      ['cred-b', 0]
    ]);
    expect(registry.get(20)?.credential).toBe('cred-b');
  });

  it('leaves nothing registered when the credential is refused', async () => {
    const { registry, lifecycle, transports, rejectedCredentials } = setup();
    rejectedCredentials.add('bad-token');

    const error = await lifecycle.register(20, 'bad-token').catch((e: unknown) => e);

    expect(kindOf(error)).toBe('InvalidCredential');
    expect(registry.has(20)).toBe(false);
    expect(transports[0].closeCalls).toBe(1);
  });

  it('evicts a bot whose transport crashes after start', async () => {
    const { registry, lifecycle, transports } = setup();
    await lifecycle.register(20, 'token-20');

    transports[0].crash(new Error('polling stopped'));
    await flush();

    expect(registry.has(20)).toBe(false);
  });

  it('ignores a crash of a transport that was already replaced', async () => {
    const { registry, lifecycle, transports } = setup();
    await lifecycle.register(20, 'cred-a');
    await lifecycle.register(20, 'cred-b');

    transports[0].crash(new Error('late failure'));
    await flush();

    expect(registry.get(20)?.transport).toBe(transports[1]);
  });
});

describe('LifecycleOrchestrator.startAll', () => {
  it('starts every eligible owner and isolates failures', async () => {
    const { store, registry, lifecycle, rejectedCredentials } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 5 * DAY)));
    seedOwner(store, dedicatedOwner(21, new Date(NOW.getTime() - 5 * DAY)));
    seedOwner(store, dedicatedOwner(22, new Date(NOW.getTime() - 5 * DAY)));
    seedOwner(store, sharedOwner(30));
    rejectedCredentials.add('token-21');

    expect(await lifecycle.startAll()).toEqual({ started: 2, failed: 1 });
    expect(registry.list().map((h) => h.ownerId).sort()).toEqual([20, 22]);
  });

  it('does not start an owner whose trial ran out unnoticed', async () => {
    const { store, registry, lifecycle } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 121 * DAY)));

    expect(await lifecycle.startAll()).toEqual({ started: 0, failed: 1 });
    expect(registry.size).toBe(0);
  });
});

describe('LifecycleOrchestrator.checkTrials', () => {
  it('flags fresh expiries once and stops their bots', async () => {
    const { store, registry, lifecycle } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 10 * DAY)));
    seedOwner(store, dedicatedOwner(21, new Date(NOW.getTime() - 121 * DAY)));
    const flagged = dedicatedOwner(22, new Date(NOW.getTime() - 200 * DAY));
    if (flagged.mode.kind === 'dedicatedChannel') flagged.mode.trial.expired = true;
    seedOwner(store, flagged);
    seedOwner(store, sharedOwner(30));
    await lifecycle.register(20, 'token-20');
    await lifecycle.register(21, 'token-21');

    expect(await lifecycle.checkTrials(NOW)).toEqual({ checked: 3, expired: 2, newlyExpired: 1, active: 1 });
    expect(registry.has(20)).toBe(true);
    expect(registry.has(21)).toBe(false);

    expect(store.owners.get(21)?.mode).toMatchObject({ trial: { expired: true } });

    expect(await lifecycle.checkTrials(NOW)).toEqual({ checked: 3, expired: 2, newlyExpired: 0, active: 1 });
  });
});

describe('LifecycleOrchestrator.pause / resume', () => {
  it('deactivates the owner and stops the bot', async () => {
    const { store, registry, lifecycle } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 10 * DAY)));
    await lifecycle.register(20, 'token-20');

    const owner = await lifecycle.pause(20);

    expect(owner.isActive).toBe(false);
    expect(registry.has(20)).toBe(false);
  });

  it('restarts an eligible dedicated owner on resume', async () => {
    const { store, registry, lifecycle, transports } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 10 * DAY), { isActive: false }));

    const result = await lifecycle.resume(20);

    expect(result.running).toBe(true);
    expect(result.owner.isActive).toBe(true);
    expect(registry.has(20)).toBe(true);
    expect(transports[0].credential).toBe('token-20');
  });

  it('reports shared owners as not running', async () => {
    const { store, lifecycle } = setup();
    seedOwner(store, sharedOwner(30, { isActive: false }));

    expect((await lifecycle.resume(30)).running).toBe(false);
  });

  it('rejects unknown owners', async () => {
    const { lifecycle } = setup();
    const error = await lifecycle.pause(99).catch((e: unknown) => e);
    expect(reasonOf(error)).toBe('OwnerNotFound');
  });
});

describe('LifecycleOrchestrator.assignCredential', () => {
  it('switches a shared owner to a dedicated bot with a fresh trial', async () => {
    const { store, registry, lifecycle } = setup();
    seedOwner(store, sharedOwner(30, { onboardingStep: 'token' }));

    const { owner, handle } = await lifecycle.assignCredential(30, 'new-token');

    expect(owner.mode).toEqual({
      kind: 'dedicatedChannel',
      credential: 'new-token',
      botUsername: 'new-token_bot',
      trial: { startedAt: NOW, expired: false }
    });
    expect(owner.onboardingStep).toBe('done');
    expect(registry.get(30)).toBe(handle);
  });

  it('keeps the trial start when the credential changes', async () => {
    const { store, lifecycle } = setup();
    const startedAt = new Date(NOW.getTime() - 10 * DAY);
    seedOwner(store, dedicatedOwner(20, startedAt));

    const { owner } = await lifecycle.assignCredential(20, 'rotated-token');

    expect(owner.mode).toMatchObject({ credential: 'rotated-token', trial: { startedAt } });
  });

  it('refuses an owner whose trial is over without opening a bot', async () => {
    const { store, lifecycle, transports } = setup();
    seedOwner(store, dedicatedOwner(20, new Date(NOW.getTime() - 121 * DAY)));

    const error = await lifecycle.assignCredential(20, 'new-token').catch((e: unknown) => e);

    expect(reasonOf(error)).toBe('TrialExpired');
    expect(transports).toHaveLength(0);
  });

  it('persists nothing when the credential is refused', async () => {
    const { store, lifecycle, rejectedCredentials } = setup();
    seedOwner(store, sharedOwner(30));
    rejectedCredentials.add('bad-token');

    const error = await lifecycle.assignCredential(30, 'bad-token').catch((e: unknown) => e);

    expect(kindOf(error)).toBe('InvalidCredential');
    expect(store.owners.get(30)?.mode.kind).toBe('sharedFrontDoor');
  });

  it('stops the new bot when saving the owner fails', async () => {
    const { store, registry, lifecycle } = setup();
    seedOwner(store, sharedOwner(30));
    store.upsertOwner = async () => {
      throw new Error('disk full');
    };

    await expect(lifecycle.assignCredential(30, 'new-token')).rejects.toThrow('disk full');
    expect(registry.has(30)).toBe(false);
  });
});
