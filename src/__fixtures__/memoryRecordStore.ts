import type { QuotaDecision, RecordStore } from '../types/store.types';
import type {
  Conversation,
  Forward,
  MessageKind,
  MessageRole,
  Owner,
  OwnerFields,
  OwnerStats,
  RelayMessage,
  RelayUser
} from '../types/relay.types';

// Yields once so concurrent callers interleave the way they would against a database
const tick = (): Promise<void> => Promise.resolve();

/**
 * In-process RecordStore with the same write rules as the MySQL store: trial
 * start is kept once set, the expired flag only rises, the quota update is
 * one step.
 */
export class MemoryRecordStore implements RecordStore {
  readonly users = new Map<number, RelayUser>();
  readonly owners = new Map<number, Owner>();
  readonly conversations: Conversation[] = [];
  readonly messages: RelayMessage[] = [];
  readonly forwards: Forward[] = [];

  private nextConversationId = 1;
  private nextMessageId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsertUser(id: number, displayName: string, username: string | null = null): Promise<RelayUser> {
    await tick();
    const now = this.clock();
    const existing = this.users.get(id);
    const user: RelayUser = {
      id,
      displayName,
      username,
      createdAt: existing?.createdAt ?? now,
      lastActive: now
    };
    this.users.set(id, user);
    return { ...user };
  }

  async getOwner(id: number): Promise<Owner | null> {
    await tick();
    const owner = this.owners.get(id);
    return owner ? this.copyOwner(owner) : null;
  }

  async upsertOwner(id: number, fields: OwnerFields): Promise<Owner> {
    await tick();
    const existing: Owner = this.owners.get(id) ?? {
      id,
      username: null,
      businessName: null,
      category: null,
      bio: null,
      logoFileId: null,
      mode: { kind: 'sharedFrontDoor' },
      isActive: true,
      onboardingStep: 'name',
      createdAt: this.clock()
    };
    const owner = this.merge(existing, fields);
    this.owners.set(id, owner);
    return this.copyOwner(owner);
  }

  async updateOwner(id: number, delta: OwnerFields): Promise<Owner | null> {
    await tick();
    const existing = this.owners.get(id);
    if (!existing) {
      return null;
    }
    const owner = this.merge(existing, delta);
    this.owners.set(id, owner);
    return this.copyOwner(owner);
  }

  async listOwners(): Promise<Owner[]> {
    await tick();
    return [...this.owners.values()].map((owner) => this.copyOwner(owner));
  }

  async listActiveDedicatedOwners(): Promise<Owner[]> {
    await tick();
    return [...this.owners.values()]
      .filter(
        (owner) =>
          owner.isActive &&
          owner.mode.kind === 'dedicatedChannel' &&
          owner.mode.credential !== null &&
          !owner.mode.trial.expired
      )
      .map((owner) => this.copyOwner(owner));
  }

  async getOrCreateConversation(userId: number, ownerId: number): Promise<Conversation> {
    await tick();
    const now = this.clock();
    const existing = this.conversations.find((c) => c.userId === userId && c.ownerId === ownerId);
    if (existing) {
      existing.lastMessageAt = now;
      return { ...existing };
    }
    const conversation: Conversation = {
      id: this.nextConversationId++,
      userId,
      ownerId,
      messageCountToday: 0,
      countDate: null,
      createdAt: now,
      lastMessageAt: now
    };
    this.conversations.push(conversation);
    return { ...conversation };
  }

  async findConversation(userId: number, ownerId: number): Promise<Conversation | null> {
    await tick();
    const conversation = this.conversations.find((c) => c.userId === userId && c.ownerId === ownerId);
    return conversation ? { ...conversation } : null;
  }

  async appendMessage(
    conversationId: number,
    role: MessageRole,
    text: string,
    kind: MessageKind,
    originId: number | null
  ): Promise<RelayMessage> {
    await tick();
    const message: RelayMessage = {
      id: this.nextMessageId++,
      conversationId,
      role,
      text,
      kind,
      originId,
      createdAt: this.clock()
    };
    this.messages.push(message);
    return { ...message };
  }

  async tryConsumeDailyQuota(userId: number, ownerId: number, cap: number, today: string): Promise<QuotaDecision> {
    await tick();
    const conversation = this.conversations.find((c) => c.userId === userId && c.ownerId === ownerId);
    if (!conversation) {
      return 'denied';
    }
    const count = conversation.countDate === today ? conversation.messageCountToday : 0;
    if (count >= cap) {
      return 'denied';
    }
    conversation.messageCountToday = count + 1;
    conversation.countDate = today;
    return 'allowed';
  }

  async markTrialExpired(ownerId: number): Promise<boolean> {
    await tick();
    const owner = this.owners.get(ownerId);
    if (!owner || owner.mode.kind !== 'dedicatedChannel' || owner.mode.trial.expired) {
      return false;
    }
    owner.mode = { ...owner.mode, trial: { ...owner.mode.trial, expired: true } };
    return true;
  }

  async purgeMessagesOlderThan(retentionMs: number, now: Date = this.clock()): Promise<number> {
    await tick();
    const cutoff = now.getTime() - retentionMs;
    const kept = this.messages.filter((message) => message.createdAt.getTime() >= cutoff);
    const deleted = this.messages.length - kept.length;
    this.messages.splice(0, this.messages.length, ...kept);
    return deleted;
  }

  async recordForward(ownerId: number, channel: string, forwardedMessageId: number, conversationId: number): Promise<void> {
    await tick();
    const existing = this.findForwardRow(ownerId, channel, forwardedMessageId);
    if (existing) {
      existing.conversationId = conversationId;
      return;
    }
    this.forwards.push({ ownerId, channel, forwardedMessageId, conversationId, createdAt: this.clock() });
  }

  async findForward(ownerId: number, channel: string, forwardedMessageId: number): Promise<Conversation | null> {
    await tick();
    const forward = this.findForwardRow(ownerId, channel, forwardedMessageId);
    const conversation = forward && this.conversations.find((c) => c.id === forward.conversationId);
    return conversation ? { ...conversation } : null;
  }

  async getOwnerStats(ownerId: number): Promise<OwnerStats> {
    await tick();
    const conversations = this.conversations.filter((c) => c.ownerId === ownerId);
    const ids = new Set(conversations.map((c) => c.id));
    return {
      totalUsers: new Set(conversations.map((c) => c.userId)).size,
      totalMessages: this.messages.filter((m) => ids.has(m.conversationId)).length
    };
  }

  async listRecentMessages(ownerId: number, limit: number): Promise<RelayMessage[]> {
    await tick();
    const ids = new Set(this.conversations.filter((c) => c.ownerId === ownerId).map((c) => c.id));
    return this.messages
      .filter((m) => ids.has(m.conversationId))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((m) => ({ ...m }));
  }

  async listUserIds(): Promise<number[]> {
    await tick();
    return [...this.users.keys()];
  }

  async listDedicatedUserIds(): Promise<number[]> {
    await tick();
    const dedicated = new Set(
      [...this.owners.values()].filter((o) => o.mode.kind === 'dedicatedChannel').map((o) => o.id)
    );
    return [...new Set(this.conversations.filter((c) => dedicated.has(c.ownerId)).map((c) => c.userId))];
  }

  conversationsFor(userId: number, ownerId: number): Conversation[] {
    return this.conversations.filter((c) => c.userId === userId && c.ownerId === ownerId);
  }

  private findForwardRow(ownerId: number, channel: string, forwardedMessageId: number): Forward | undefined {
    return this.forwards.find(
      (f) => f.ownerId === ownerId && f.channel === channel && f.forwardedMessageId === forwardedMessageId
    );
  }

  private merge(owner: Owner, fields: OwnerFields): Owner {
    const merged: Owner = { ...owner, ...fields, mode: owner.mode };
    const mode = fields.mode;
    if (mode) {
      if (mode.kind === 'dedicatedChannel') {
        const previous = owner.mode.kind === 'dedicatedChannel' ? owner.mode.trial : null;
        merged.mode = {
          ...mode,
          trial: {
            startedAt: previous?.startedAt ?? mode.trial.startedAt,
            expired: (previous?.expired ?? false) || mode.trial.expired
          }
        };
      } else {
        merged.mode = { kind: 'sharedFrontDoor' };
      }
    }
    return merged;
  }

  private copyOwner(owner: Owner): Owner {
    const mode = owner.mode;
    return {
      ...owner,
      mode: mode.kind === 'dedicatedChannel' ? { ...mode, trial: { ...mode.trial } } : { kind: 'sharedFrontDoor' }
    };
  }
}
