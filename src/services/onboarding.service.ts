import logger from '../config/logger';
import { KeyedLock } from '../common/keyedLock';
import { RelayError, TransportError } from '../common/errors';
import { storeCall } from '../common/functions';
import {
  BIO_MAX_LENGTH,
  BUSINESS_NAME_MAX_LENGTH,
  BUSINESS_NAME_MIN_LENGTH,
  OWNER_CATEGORIES
} from '../common/constants';
import type { RecordStore } from '../types/store.types';
import type { OnboardingStep, Owner, OwnerMode } from '../types/relay.types';
import { OwnerActionRejected } from './lifecycle.service';
import type { LifecycleOrchestrator } from './lifecycle.service';

export type RegistrationMode = 'shared' | 'dedicated';

export type ProfileProblem = 'NameLength' | 'UnknownCategory' | 'BioTooLong';

export type OnboardingProblem = ProfileProblem | 'LogoExpected' | 'InvalidCredential' | 'TrialExpired';

type Checked<T> = { ok: true; value: T } | { ok: false; problem: ProfileProblem };

export class ProfileRejected extends RelayError {
  constructor(public readonly problem: ProfileProblem) {
    super(`Invalid owner profile: ${problem}`);
  }
}

export const checkBusinessName = (raw: string): Checked<string> => {
  const value = raw.trim();
  if (value.length < BUSINESS_NAME_MIN_LENGTH || value.length > BUSINESS_NAME_MAX_LENGTH) {
    return { ok: false, problem: 'NameLength' };
  }
  return { ok: true, value };
};

// Matches case-insensitively and returns the canonical spelling
export const checkCategory = (raw: string): Checked<string> => {
  const wanted = raw.trim().toLowerCase();
  const category = OWNER_CATEGORIES.find((candidate) => candidate.toLowerCase() === wanted);
  return category ? { ok: true, value: category } : { ok: false, problem: 'UnknownCategory' };
};

export const checkBio = (raw: string): Checked<string> => {
  const value = raw.trim();
  return value.length > BIO_MAX_LENGTH ? { ok: false, problem: 'BioTooLong' } : { ok: true, value };
};

export const parseRegistrationMode = (payload: string): RegistrationMode =>
  ['own', 'dedicated'].includes(payload.trim().toLowerCase()) ? 'dedicated' : 'shared';

export interface OnboardingInput {
  text: string;
  fileId: string | null;
  skip: boolean;
}

export interface OnboardingResult {
  owner: Owner;
  /** Set when the input was refused; the owner stays on the same step. */
  problem: OnboardingProblem | null;
}

export interface NewOwner {
  ownerId: number;
  username: string | null;
  mode: RegistrationMode;
  businessName: string;
  category: string | null;
  bio: string | null;
  credential: string | null;
}

export interface OnboardingDeps {
  store: RecordStore;
  lifecycle: LifecycleOrchestrator;
  timeouts: { storeMs: number };
  clock?: () => Date;
}

/**
 * Creates owners and walks them through name, category, bio, logo and (for
 * dedicated owners) bot token. The current step is stored on the owner, so a
 * half-finished registration survives a restart.
 */
export class OnboardingService {
  private readonly ownerLock = new KeyedLock();
  private readonly clock: () => Date;

  constructor(private readonly deps: OnboardingDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async register(ownerId: number, username: string | null, mode: RegistrationMode): Promise<Owner> {
    return this.ownerLock.run(String(ownerId), async () => {
      await this.ensureNotRegistered(ownerId);
      const owner = await this.stored(
        this.deps.store.upsertOwner(ownerId, {
          username,
          mode: this.initialMode(mode),
          isActive: true,
          onboardingStep: 'name'
        }),
        'upsertOwner'
      );
      logger.info({ ownerId, mode }, 'Owner registration started');
      return owner;
    });
  }

  async submit(ownerId: number, input: OnboardingInput): Promise<OnboardingResult> {
    return this.ownerLock.run(String(ownerId), async () => {
      const owner = await this.stored(this.deps.store.getOwner(ownerId), 'getOwner');
      if (!owner) {
        throw new OwnerActionRejected('OwnerNotFound', ownerId);
      }
      return this.applyStep(owner, input);
    });
  }

  /** Registers a complete owner in one call; a credential, when given, is proven and started. */
  async createOwner(input: NewOwner): Promise<Owner> {
    const businessName = this.accept(checkBusinessName(input.businessName));
    const category = input.category === null ? null : this.accept(checkCategory(input.category));
    const bio = input.bio === null ? null : this.accept(checkBio(input.bio));
    const { ownerId } = input;

    const created = await this.ownerLock.run(String(ownerId), async () => {
      await this.ensureNotRegistered(ownerId);
      return this.stored(
        this.deps.store.upsertOwner(ownerId, {
          username: input.username,
          businessName,
          category,
          bio,
          mode: this.initialMode(input.mode),
          isActive: true,
          onboardingStep: input.mode === 'dedicated' ? 'token' : 'done'
        }),
        'upsertOwner'
      );
    });
    logger.info({ ownerId, mode: input.mode }, 'Owner created');

    if (input.mode === 'dedicated' && input.credential !== null) {
      const { owner } = await this.deps.lifecycle.assignCredential(ownerId, input.credential);
      return owner;
    }
    return created;
  }

  private async applyStep(owner: Owner, input: OnboardingInput): Promise<OnboardingResult> {
    switch (owner.onboardingStep) {
      case 'name': {
        const name = checkBusinessName(input.text);
        return name.ok
          ? this.advance(owner, { businessName: name.value }, 'category')
          : { owner, problem: name.problem };
      }
      case 'category': {
        const category = checkCategory(input.text);
        return category.ok
          ? this.advance(owner, { category: category.value }, 'bio')
          : { owner, problem: category.problem };
      }
      case 'bio': {
        const bio = checkBio(input.text);
        return bio.ok ? this.advance(owner, { bio: bio.value }, 'logo') : { owner, problem: bio.problem };
      }
      case 'logo': {
        const next: OnboardingStep = owner.mode.kind === 'dedicatedChannel' ? 'token' : 'done';
        if (input.fileId !== null) {
          return this.advance(owner, { logoFileId: input.fileId }, next);
        }
        return input.skip ? this.advance(owner, {}, next) : { owner, problem: 'LogoExpected' };
      }
      case 'token':
        return this.submitCredential(owner, input.text.trim());
      case 'done':
        return { owner, problem: null };
    }
  }

  private async submitCredential(owner: Owner, credential: string): Promise<OnboardingResult> {
    try {
      const { owner: updated } = await this.deps.lifecycle.assignCredential(owner.id, credential);
      logger.info({ ownerId: owner.id }, 'Owner registration completed');
      return { owner: updated, problem: null };
    } catch (error) {
      if (error instanceof TransportError && error.kind === 'InvalidCredential') {
        return { owner, problem: 'InvalidCredential' };
      }
      if (error instanceof OwnerActionRejected && error.reason === 'TrialExpired') {
        return { owner, problem: 'TrialExpired' };
      }
      throw error;
    }
  }

  private async advance(
    owner: Owner,
    fields: Partial<Pick<Owner, 'businessName' | 'category' | 'bio' | 'logoFileId'>>,
    next: OnboardingStep
  ): Promise<OnboardingResult> {
    const updated = await this.stored(
      this.deps.store.updateOwner(owner.id, { ...fields, onboardingStep: next }),
      'updateOwner'
    );
    if (!updated) {
      throw new OwnerActionRejected('OwnerNotFound', owner.id);
    }
    if (next === 'done') {
      logger.info({ ownerId: owner.id }, 'Owner registration completed');
    }
    return { owner: updated, problem: null };
  }

  private async ensureNotRegistered(ownerId: number): Promise<void> {
    const existing = await this.stored(this.deps.store.getOwner(ownerId), 'getOwner');
    if (existing && existing.onboardingStep === 'done') {
      throw new OwnerActionRejected('AlreadyRegistered', ownerId);
    }
  }

  // The store keeps an earlier trial start, so registering again never restarts a trial
  private initialMode(mode: RegistrationMode): OwnerMode {
    if (mode === 'shared') {
      return { kind: 'sharedFrontDoor' };
    }
    return {
      kind: 'dedicatedChannel',
      credential: null,
      botUsername: null,
      trial: { startedAt: this.clock(), expired: false }
    };
  }

  private accept<T>(checked: Checked<T>): T {
    if (!checked.ok) {
      throw new ProfileRejected(checked.problem);
    }
    return checked.value;
  }

  private stored<T>(work: Promise<T>, operation: string): Promise<T> {
    return storeCall(work, this.deps.timeouts.storeMs, operation);
  }
}
