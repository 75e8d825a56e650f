import { DAY_MS } from '../common/constants';
import type { PolicyDenyReason } from '../common/errors';
import type { QuotaSettings } from '../config/settings';
import type { Conversation, Owner, TrialWindow } from '../types/relay.types';

export interface PolicySettings {
  quota: QuotaSettings;
  trialDays: number;
  timeZone: string;
}

export type PolicyDecision =
  | { allowed: true }
  | {
      allowed: false;
      reason: PolicyDenyReason;
      /** Set when the trial expiry was computed from the clock rather than read from the stored flag. */
      freshExpiry: boolean;
    };

export interface LocalClock {
  hour: number;
  minute: number;
  /** YYYY-MM-DD */
  dayKey: string;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

// Wall-clock reading of `now` in the given IANA zone
export const localClock = (now: Date, timeZone: string): LocalClock => {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(now)) {
    parts[part.type] = part.value;
  }

  return {
    hour: Number(parts.hour),
    minute: Number(parts.minute),
    dayKey: `${parts.year}-${parts.month}-${parts.day}`
  };
};

export const dayKey = (now: Date, timeZone: string): string => localClock(now, timeZone).dayKey;

export const trialEndsAt = (trial: TrialWindow, trialDays: number): Date =>
  new Date(trial.startedAt.getTime() + trialDays * DAY_MS);

// Whole days left, rounded down; 0 once the trial has run out
export const trialDaysRemaining = (trial: TrialWindow, trialDays: number, now: Date): number => {
  const remaining = trialEndsAt(trial, trialDays).getTime() - now.getTime();
  return remaining > 0 ? Math.floor(remaining / DAY_MS) : 0;
};

/**
 * Quota, active-hour window and trial decisions. Pure: the caller persists
 * whatever a decision implies.
 */
export class PolicyService {
  constructor(private readonly settings: PolicySettings) {}

  get dailyLimit(): number {
    return this.settings.quota.dailyLimit;
  }

  get trialDays(): number {
    return this.settings.trialDays;
  }

  get timeZone(): string {
    return this.settings.timeZone;
  }

  admits(owner: Owner, conversation: Conversation | null, now: Date): PolicyDecision {
    const mode = owner.mode;
    switch (mode.kind) {
      case 'dedicatedChannel':
        return this.evaluateTrial(mode.trial, now);
      case 'sharedFrontDoor':
        return this.evaluateQuota(conversation, now);
    }
  }

  evaluateTrial(trial: TrialWindow, now: Date): PolicyDecision {
    if (trial.expired) {
      return { allowed: false, reason: 'TrialExpired', freshExpiry: false };
    }
    if (now.getTime() > this.trialEndsAt(trial).getTime()) {
      return { allowed: false, reason: 'TrialExpired', freshExpiry: true };
    }
    return { allowed: true };
  }

  // The window is checked before the counter
  evaluateQuota(conversation: Conversation | null, now: Date): PolicyDecision {
    if (!this.isWithinActiveWindow(now)) {
      return { allowed: false, reason: 'OutsideActiveWindow', freshExpiry: false };
    }
    if (this.countToday(conversation, now) >= this.settings.quota.dailyLimit) {
      return { allowed: false, reason: 'DailyLimitReached', freshExpiry: false };
    }
    return { allowed: true };
  }

  // Closed-open [startHour:00, endHour:endMinute)
  isWithinActiveWindow(now: Date): boolean {
    const { startHour, endHour, endMinute } = this.settings.quota;
    const clock = localClock(now, this.settings.timeZone);
    const minuteOfDay = clock.hour * 60 + clock.minute;
    return minuteOfDay >= startHour * 60 && minuteOfDay < endHour * 60 + endMinute;
  }

  // A counter stamped with an earlier day reads as zero
  countToday(conversation: Conversation | null, now: Date): number {
    if (!conversation || conversation.countDate !== this.dayKey(now)) {
      return 0;
    }
    return conversation.messageCountToday;
  }

  dayKey(now: Date): string {
    return dayKey(now, this.settings.timeZone);
  }

  trialEndsAt(trial: TrialWindow): Date {
    return trialEndsAt(trial, this.settings.trialDays);
  }

  trialDaysRemaining(trial: TrialWindow, now: Date): number {
    return trialDaysRemaining(trial, this.settings.trialDays, now);
  }
}
