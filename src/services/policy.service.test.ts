import { describe, expect, it } from 'vitest';
import { PolicyService, dayKey, localClock, trialDaysRemaining } from './policy.service';
import { dedicatedOwner, sharedOwner, testPolicySettings } from '../__fixtures__/owners';
import type { Conversation } from '../types/relay.types';

const policy = new PolicyService(testPolicySettings);
const DAY = 24 * 60 * 60 * 1000;

const conversation = (messageCountToday: number, countDate: string | null): Conversation => ({
  id: 1,
  userId: 10,
  ownerId: 20,
  messageCountToday,
  countDate,
  createdAt: new Date('2026-03-01T00:00:00Z'),
  lastMessageAt: new Date('2026-03-01T00:00:00Z')
});

describe('localClock', () => {
  it('reads wall-clock time in the configured zone', () => {
    expect(localClock(new Date('2026-03-10T22:30:00Z'), 'Asia/Kolkata')).toEqual({
      hour: 4,
      minute: 0,
      dayKey: '2026-03-11'
    });
  });

  it('reports midnight as hour 0', () => {
    expect(localClock(new Date('2026-03-10T00:05:00Z'), 'UTC')).toEqual({
      hour: 0,
      minute: 5,
      dayKey: '2026-03-10'
    });
  });

  it('derives the day key from the zone, not from UTC', () => {
    expect(dayKey(new Date('2026-03-10T23:30:00Z'), 'UTC')).toBe('2026-03-10');
    expect(dayKey(new Date('2026-03-10T23:30:00Z'), 'Asia/Tokyo')).toBe('2026-03-11');
  });
});

describe('PolicyService.isWithinActiveWindow', () => {
  it.each([
    ['2026-03-10T08:59:00Z', false],
    ['2026-03-10T09:00:00Z', true],
    ['2026-03-10T10:00:00Z', true],
    ['2026-03-10T23:49:00Z', true],
    ['2026-03-10T23:50:00Z', false],
    ['2026-03-10T23:55:00Z', false]
  ])('at %s returns %s', (iso, expected) => {
    expect(policy.isWithinActiveWindow(new Date(iso))).toBe(expected);
  });
});

describe('PolicyService.admits', () => {
  const now = new Date('2026-03-10T10:00:00Z');

  it('allows a shared owner inside the window with no conversation yet', () => {
    expect(policy.admits(sharedOwner(20), null, now)).toEqual({ allowed: true });
  });

  it('denies a shared owner outside the window before looking at the counter', () => {
    const late = new Date('2026-03-10T23:55:00Z');
    expect(policy.admits(sharedOwner(20), conversation(5, '2026-03-10'), late)).toEqual({
      allowed: false,
      reason: 'OutsideActiveWindow',
      freshExpiry: false
    });
  });

  it('denies once the counter for today has reached the cap', () => {
    expect(policy.admits(sharedOwner(20), conversation(2, '2026-03-10'), now)).toEqual({
      allowed: false,
      reason: 'DailyLimitReached',
      freshExpiry: false
    });
  });

  it('treats a counter stamped with an earlier day as reset', () => {
    expect(policy.admits(sharedOwner(20), conversation(2, '2026-03-09'), now)).toEqual({ allowed: true });
  });

  it('ignores the window and counter for dedicated owners', () => {
    const owner = dedicatedOwner(30, new Date(now.getTime() - 10 * DAY));
    const late = new Date('2026-03-10T23:55:00Z');
    expect(policy.admits(owner, conversation(9, '2026-03-10'), late)).toEqual({ allowed: true });
  });

  it('computes a fresh expiry once the trial has run past its length', () => {
    const owner = dedicatedOwner(30, new Date(now.getTime() - 121 * DAY));
    expect(policy.admits(owner, null, now)).toEqual({
      allowed: false,
      reason: 'TrialExpired',
      freshExpiry: true
    });
  });

  it('still allows on the last instant of the trial', () => {
    const owner = dedicatedOwner(30, new Date(now.getTime() - 120 * DAY));
    expect(policy.admits(owner, null, now)).toEqual({ allowed: true });
  });

  it('keeps denying a flagged trial regardless of the clock', () => {
    const owner = dedicatedOwner(30, now);
    if (owner.mode.kind !== 'dedicatedChannel') throw new Error('expected a dedicated owner');
    owner.mode.trial.expired = true;

    expect(policy.admits(owner, null, new Date(now.getTime() - 365 * DAY))).toEqual({
      allowed: false,
      reason: 'TrialExpired',
      freshExpiry: false
    });
  });
});

describe('trial helpers', () => {
  const trial = { startedAt: new Date('2026-01-01T00:00:00Z'), expired: false };

  it('ends the trial the configured number of days after it started', () => {
    expect(policy.trialEndsAt(trial).toISOString()).toBe('2026-05-01T00:00:00.000Z');
  });

  it('rounds the remaining days down', () => {
    expect(trialDaysRemaining(trial, 120, new Date('2026-04-24T00:00:00Z'))).toBe(7);
    expect(trialDaysRemaining(trial, 120, new Date('2026-04-24T12:00:00Z'))).toBe(6);
  });

  it('never reports negative days', () => {
    expect(policy.trialDaysRemaining(trial, new Date('2026-06-01T00:00:00Z'))).toBe(0);
  });
});
