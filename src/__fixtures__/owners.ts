import type { PolicySettings } from '../services/policy.service';
import type { MemoryRecordStore } from './memoryRecordStore';
import type { Owner } from '../types/relay.types';

export const TEST_FOOTER = 'Made with the relay';

export const testPolicySettings: PolicySettings = {
  quota: { dailyLimit: 2, startHour: 9, endHour: 23, endMinute: 50 },
  trialDays: 120,
  timeZone: 'UTC'
};

export const testTimeouts = { storeMs: 1000, transportMs: 1000 };

export const sharedOwner = (id: number, overrides: Partial<Owner> = {}): Owner => ({
  id,
  username: `owner${id}`,
  businessName: `Shop ${id}`,
  category: 'retail',
  bio: null,
  logoFileId: null,
  mode: { kind: 'sharedFrontDoor' },
  isActive: true,
  onboardingStep: 'done',
  createdAt: new Date('2026-01-01T00:00:00Z'),
  ...overrides
});

export const dedicatedOwner = (
  id: number,
  trialStartedAt: Date,
  overrides: Partial<Owner> = {},
  credential: string | null = `token-${id}`
): Owner =>
  sharedOwner(id, {
    mode: {
      kind: 'dedicatedChannel',
      credential,
      botUsername: credential ? `${credential}_bot` : null,
      trial: { startedAt: trialStartedAt, expired: false }
    },
    ...overrides
  });

export const seedOwner = (store: MemoryRecordStore, owner: Owner): Owner => {
  store.owners.set(owner.id, owner);
  return owner;
};
