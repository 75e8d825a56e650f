import { describe, expect, it } from 'vitest';
import { LifecycleOrchestrator, OwnerActionRejected } from './lifecycle.service';
import {
  OnboardingService,
  ProfileRejected,
  checkBio,
  checkBusinessName,
  checkCategory,
  parseRegistrationMode
} from './onboarding.service';
import type { OnboardingInput } from './onboarding.service';
import { PolicyService } from './policy.service';
import { TenantRegistry } from './tenantRegistry.service';
import { TransportError } from '../common/errors';
import { FakeTransport } from '../__fixtures__/fakeTransport';
import { MemoryRecordStore } from '../__fixtures__/memoryRecordStore';
import { seedOwner, sharedOwner, testPolicySettings, testTimeouts } from '../__fixtures__/owners';

const DAY = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-03-10T10:00:00Z');

const setup = () => {
  let now = NOW;
  const clock = () => now;
  const store = new MemoryRecordStore(clock);
  const registry = new TenantRegistry({ closeTimeoutMs: 100 });
  const rejectedCredentials = new Set<string>();

  const lifecycle = new LifecycleOrchestrator({
    store,
    registry,
    policy: new PolicyService(testPolicySettings),
    createTransport: () => {
      const transport = new FakeTransport(5000);
      const open = transport.open.bind(transport);
      transport.open = async (credential) => {
        if (rejectedCredentials.has(credential)) {
          transport.openError = new TransportError('InvalidCredential', 'Unauthorized');
        }
        return open(credential);
      };
      return transport;
    },
    bindInbound: () => async () => undefined,
    timeouts: testTimeouts,
    clock
  });
  const onboarding = new OnboardingService({ store, lifecycle, timeouts: testTimeouts, clock });
  const setNow = (value: Date) => {
    now = value;
  };

  return { store, registry, onboarding, rejectedCredentials, setNow };
};

const text = (value: string): OnboardingInput => ({ text: value, fileId: null, skip: false });
const SKIP: OnboardingInput = { text: '/skip', fileId: null, skip: true };

describe('profile checks', () => {
  it('bounds the business name after trimming', () => {
    expect(checkBusinessName('  A ')).toEqual({ ok: false, problem: 'NameLength' });
    expect(checkBusinessName('x'.repeat(101))).toEqual({ ok: false, problem: 'NameLength' });
    expect(checkBusinessName(' Lamp Shop ')).toEqual({ ok: true, value: 'Lamp Shop' });
  });

  it('accepts known categories in any case', () => {
    expect(checkCategory(' e-commerce')).toEqual({ ok: true, value: 'E-commerce' });
    expect(checkCategory('Food')).toEqual({ ok: false, problem: 'UnknownCategory' });
  });

  it('caps the bio at 500 characters', () => {
    expect(checkBio('x'.repeat(500))).toEqual({ ok: true, value: 'x'.repeat(500) });
    expect(checkBio('x'.repeat(501))).toEqual({ ok: false, problem: 'BioTooLong' });
  });

  it('reads the registration mode from the command payload', () => {
    expect(['own', 'Dedicated', '', 'free'].map(parseRegistrationMode)).toEqual(['dedicated', 'dedicated', 'shared', 'shared']);
  });
});

describe('OnboardingService', () => {
  it('walks a shared owner from name to done', async () => {
    const { store, onboarding } = setup();

    const registered = await onboarding.register(30, 'lamps', 'shared');
    expect(registered).toMatchObject({ id: 30, username: 'lamps', mode: { kind: 'sharedFrontDoor' }, onboardingStep: 'name' });

    const steps: Array<[string, string | null]> = [];
    for (const input of [text('Lamp Shop'), text('tech'), text('Lamps for every desk'), SKIP]) {
      const result = await onboarding.submit(30, input);
      steps.push([result.owner.onboardingStep, result.problem]);
    }

    expect(steps).toEqual([
      ['category', null],
      ['bio', null],
      ['logo', null],
      ['done', null]
    ]);
    expect(store.owners.get(30)).toMatchObject({
      businessName: 'Lamp Shop',
      category: 'Tech',
      bio: 'Lamps for every desk',
      logoFileId: null,
      onboardingStep: 'done'
    });
  });

  it('keeps the owner on the same step when the input is refused', async () => {
    const { store, onboarding } = setup();
    await onboarding.register(30, null, 'shared');

    expect(await onboarding.submit(30, text('x'))).toMatchObject({ owner: { onboardingStep: 'name' }, problem: 'NameLength' });
    await onboarding.submit(30, text('Lamp Shop'));
    expect((await onboarding.submit(30, text('Food'))).problem).toBe('UnknownCategory');
    await onboarding.submit(30, text('Other'));
    expect((await onboarding.submit(30, text('x'.repeat(501)))).problem).toBe('BioTooLong');
    await onboarding.submit(30, text('Short bio'));
    expect((await onboarding.submit(30, text('no logo for now'))).problem).toBe('LogoExpected');

    expect(await onboarding.submit(30, { text: '[photo]', fileId: 'logo-file', skip: false })).toMatchObject({
      owner: { logoFileId: 'logo-file', onboardingStep: 'done' },
      problem: null
    });
    expect(store.owners.get(30)?.category).toBe('Other');
  });

  it('ends a dedicated registration by starting the bot', async () => {
    const { registry, onboarding, rejectedCredentials } = setup();
    rejectedCredentials.add('bad-token');
    await onboarding.register(31, null, 'dedicated');
    for (const input of [text('Bot Shop'), text('Tech'), text('We build bots')]) {
      await onboarding.submit(31, input);
    }

    expect((await onboarding.submit(31, SKIP)).owner.onboardingStep).toBe('token');
    expect(await onboarding.submit(31, text('bad-token'))).toMatchObject({
      owner: { onboardingStep: 'token' },
      problem: 'InvalidCredential'
    });
    expect(registry.has(31)).toBe(false);

    expect(await onboarding.submit(31, text(' shop-token '))).toMatchObject({
      owner: {
        onboardingStep: 'done',
        mode: { kind: 'dedicatedChannel', credential: 'shop-token', botUsername: 'shop-token_bot' }
      },
      problem: null
    });
    expect(registry.get(31)?.credential).toBe('shop-token');
  });

  it('never restarts a trial when a dedicated owner registers again', async () => {
    const { onboarding, setNow } = setup();
    await onboarding.register(31, null, 'dedicated');
    setNow(new Date(NOW.getTime() + 5 * DAY));

    const again = await onboarding.register(31, null, 'dedicated');

    expect(again.mode).toMatchObject({ kind: 'dedicatedChannel', trial: { startedAt: NOW, expired: false } });
    expect(again.onboardingStep).toBe('name');
  });

  it('refuses to register a finished owner again', async () => {
    const { store, onboarding } = setup();
    seedOwner(store, sharedOwner(20));

    const error = await onboarding.register(20, null, 'dedicated').catch((e: unknown) => e);

    expect(error instanceof OwnerActionRejected && error.reason).toBe('AlreadyRegistered');
    expect(store.owners.get(20)?.mode).toEqual({ kind: 'sharedFrontDoor' });
  });

  it('creates a complete owner in one call', async () => {
    const { store, onboarding } = setup();

    const owner = await onboarding.createOwner({
      ownerId: 32,
      username: null,
      mode: 'shared',
      businessName: 'Desk Lamps',
      category: 'education',
      bio: null,
      credential: null
    });

    expect(owner).toMatchObject({ id: 32, businessName: 'Desk Lamps', category: 'Education', onboardingStep: 'done' });
    expect(store.owners.has(32)).toBe(true);
  });

  it('checks the profile before writing anything', async () => {
    const { store, onboarding } = setup();

    const error = await onboarding
      .createOwner({ ownerId: 33, username: null, mode: 'shared', businessName: 'D', category: null, bio: null, credential: null })
      .catch((e: unknown) => e);

    expect(error instanceof ProfileRejected && error.problem).toBe('NameLength');
    expect(store.owners.has(33)).toBe(false);
  });

  it('keeps a created dedicated owner at the token step when its token is refused', async () => {
    const { store, registry, onboarding, rejectedCredentials } = setup();
    rejectedCredentials.add('bad-token');

    const error = await onboarding
      .createOwner({
        ownerId: 34,
        username: null,
        mode: 'dedicated',
        businessName: 'Bot Shop',
        category: null,
        bio: null,
        credential: 'bad-token'
      })
      .catch((e: unknown) => e);

    expect(error instanceof TransportError && error.kind).toBe('InvalidCredential');
    expect(store.owners.get(34)?.onboardingStep).toBe('token');
    expect(registry.has(34)).toBe(false);
  });
});
