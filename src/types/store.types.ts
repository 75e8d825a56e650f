import type {
  Conversation,
  MessageKind,
  MessageRole,
  Owner,
  OwnerFields,
  OwnerStats,
  RelayMessage,
  RelayUser
} from './relay.types';

export type QuotaDecision = 'allowed' | 'denied';

/**
 * Durable storage used by the relay core.
 *
 * Writes on the routing path are upserts or appends so a timed-out call can be
 * retried without side effects.
 */
export interface RecordStore {
  upsertUser(id: number, displayName: string, username?: string | null): Promise<RelayUser>;

  getOwner(id: number): Promise<Owner | null>;
  upsertOwner(id: number, fields: OwnerFields): Promise<Owner>;
  updateOwner(id: number, delta: OwnerFields): Promise<Owner | null>;
  listOwners(): Promise<Owner[]>;
  /** Dedicated owners that are active, not trial-expired and hold a credential. */
  listActiveDedicatedOwners(): Promise<Owner[]>;

  /** Atomic upsert on the (user, owner) pairing. */
  getOrCreateConversation(userId: number, ownerId: number): Promise<Conversation>;
  findConversation(userId: number, ownerId: number): Promise<Conversation | null>;

  appendMessage(
    conversationId: number,
    role: MessageRole,
    text: string,
    kind: MessageKind,
    originId: number | null
  ): Promise<RelayMessage>;

  /**
   * Resets the counter when `today` differs from the stored date, then
   * increments it unless the cap is already reached. One atomic step.
   */
  tryConsumeDailyQuota(userId: number, ownerId: number, cap: number, today: string): Promise<QuotaDecision>;

  /** Returns true only for the call that flipped the flag. */
  markTrialExpired(ownerId: number): Promise<boolean>;

  purgeMessagesOlderThan(retentionMs: number, now?: Date): Promise<number>;

  /** `channel` names the bot that sent the forward; message ids repeat across bots. */
  recordForward(ownerId: number, channel: string, forwardedMessageId: number, conversationId: number): Promise<void>;
  findForward(ownerId: number, channel: string, forwardedMessageId: number): Promise<Conversation | null>;

  getOwnerStats(ownerId: number): Promise<OwnerStats>;
  listRecentMessages(ownerId: number, limit: number): Promise<RelayMessage[]>;
  listUserIds(): Promise<number[]>;
  listDedicatedUserIds(): Promise<number[]>;
}
