import logger from '../config/logger';
import { KeyedLock } from '../common/keyedLock';
import { asTransportError, isConstraintViolation, isStoreTimeout } from '../common/errors';
import type { RejectionReason, TransportError } from '../common/errors';
import { storeCall, transportCall } from '../common/functions';
import { addFooter } from '../templates/footer';
import { forwardText, replyText } from '../templates/messages';
import type { ChannelTransport } from '../channels/channel.types';
import type { RecordStore } from '../types/store.types';
import type { Conversation, MessageKind, Owner } from '../types/relay.types';
import type { PolicyService } from './policy.service';
import type { TenantRegistry } from './tenantRegistry.service';

export interface UserMessage {
  ownerId: number;
  userId: number;
  userName: string;
  username: string | null;
  text: string;
  kind: MessageKind;
  originId: number | null;
  /** Transport the message arrived on; the forward leaves through it too. */
  via: ChannelTransport;
}

export type RouteOutcome =
  | { status: 'Delivered'; conversationId: number; messageId: number }
  | { status: 'Rejected'; reason: RejectionReason }
  | { status: 'DeliveryFailed'; error: TransportError };

export interface MessageRouterDeps {
  store: RecordStore;
  registry: TenantRegistry;
  policy: PolicyService;
  frontDoor: ChannelTransport;
  footerText: string;
  timeouts: { storeMs: number; transportMs: number };
  clock?: () => Date;
}

const rejected = (reason: RejectionReason): RouteOutcome => ({ status: 'Rejected', reason });

export const FRONT_DOOR_CHANNEL = 'frontDoor';

/**
 * The request path in both directions. All work for one (user, owner) pair
 * runs through a FIFO lock, so messages of a pair are persisted in arrival
 * order and the quota check and commit cannot interleave.
 */
export class MessageRouter {
  private readonly pairLock = new KeyedLock();
  private readonly clock: () => Date;

  constructor(private readonly deps: MessageRouterDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async routeUserMessage(message: UserMessage, now: Date = this.clock()): Promise<RouteOutcome> {
    return this.pairLock.run(this.pairKey(message.userId, message.ownerId), () =>
      this.guardStore(() => this.deliverToOwner(message, now))
    );
  }

  /** Sends through `via` when given, otherwise through the owner's current outbound bot. */
  async routeOwnerReply(ownerId: number, userId: number, text: string, via?: ChannelTransport): Promise<RouteOutcome> {
    return this.pairLock.run(this.pairKey(userId, ownerId), () =>
      this.guardStore(() => this.deliverToUser(ownerId, userId, text, via))
    );
  }

  /**
   * Owner replies name the forwarded message, which maps back to its
   * conversation. Message ids are only unique within one bot's chat, so the
   * lookup is scoped to the transport the reply arrived on.
   */
  async routeOwnerReplyToForward(
    ownerId: number,
    via: ChannelTransport,
    forwardedMessageId: number,
    text: string
  ): Promise<RouteOutcome> {
    const channel = this.channelOf(via, ownerId);
    if (channel === null) {
      return rejected('ConversationNotFound');
    }
    return this.guardStore(async () => {
      const conversation = await this.stored(
        this.deps.store.findForward(ownerId, channel, forwardedMessageId),
        'findForward'
      );
      if (!conversation) {
        return rejected('ConversationNotFound');
      }
      // the answer leaves through the bot the user wrote to
      return this.routeOwnerReply(ownerId, conversation.userId, text, via);
    });
  }

  /** Forward channel of a transport: the front door, or the owner's live dedicated bot. */
  channelOf(transport: ChannelTransport, ownerId: number): string | null {
    if (transport === this.deps.frontDoor) {
      return FRONT_DOOR_CHANNEL;
    }
    const handle = this.deps.registry.get(ownerId);
    return handle && handle.transport === transport ? `bot:${handle.identity.botId}` : null;
  }

  selectTransport(owner: Owner): ChannelTransport {
    const mode = owner.mode;
    switch (mode.kind) {
      case 'sharedFrontDoor':
        return this.deps.frontDoor;
      case 'dedicatedChannel':
        return this.deps.registry.get(owner.id)?.transport ?? this.deps.frontDoor;
    }
  }

  private async deliverToOwner(message: UserMessage, now: Date): Promise<RouteOutcome> {
    const { store, policy } = this.deps;
    const { ownerId, userId } = message;

    const owner = await this.stored(store.getOwner(ownerId), 'getOwner');
    if (!owner) {
      return rejected('OwnerNotFound');
    }
    if (!owner.isActive) {
      return rejected('OwnerInactive');
    }

    const existing = owner.mode.kind === 'sharedFrontDoor'
      ? await this.stored(store.findConversation(userId, ownerId), 'findConversation')
      : null;

    const decision = policy.admits(owner, existing, now);
    if (!decision.allowed) {
      if (decision.freshExpiry) {
        const flipped = await this.stored(store.markTrialExpired(ownerId), 'markTrialExpired');
        if (flipped) {
          logger.info({ ownerId }, 'Trial expired on inbound message');
        }
      }
      return rejected(decision.reason);
    }

    await this.stored(store.upsertUser(userId, message.userName, message.username), 'upsertUser');
    const conversation = await this.resolveConversation(userId, ownerId);
    await this.stored(
      store.appendMessage(conversation.id, 'user', message.text, message.kind, message.originId),
      'appendMessage'
    );

    let messageId: number;
    try {
      const sent = await transportCall(
        message.via.send(ownerId, forwardText(message)),
        this.deps.timeouts.transportMs,
        'Forward to owner'
      );
      messageId = sent.messageId;
    } catch (error) {
      const failure = asTransportError(error);
      logger.warn({ err: failure, kind: failure.kind, ownerId, userId }, 'Failed to forward message to owner');
      return { status: 'DeliveryFailed', error: failure };
    }

    // the message is out; bookkeeping failures from here on are logged, never turned into a retry
    if (owner.mode.kind === 'sharedFrontDoor') {
      await this.afterDelivery('tryConsumeDailyQuota', ownerId, userId, async () => {
        const quota = await this.stored(
          store.tryConsumeDailyQuota(userId, ownerId, policy.dailyLimit, policy.dayKey(now)),
          'tryConsumeDailyQuota'
        );
        if (quota === 'denied') {
          // only another process writing the same pair can get here
          logger.warn({ ownerId, userId }, 'Quota slot taken concurrently after delivery');
        }
      });
    }

    const channel = this.channelOf(message.via, ownerId);
    if (channel === null) {
      logger.warn({ ownerId, userId, messageId }, 'Forward left through a replaced bot, reply mapping skipped');
    } else {
      await this.afterDelivery('recordForward', ownerId, userId, () =>
        this.stored(store.recordForward(ownerId, channel, messageId, conversation.id), 'recordForward')
      );
    }

    return { status: 'Delivered', conversationId: conversation.id, messageId };
  }

  private async deliverToUser(
    ownerId: number,
    userId: number,
    text: string,
    via: ChannelTransport | undefined
  ): Promise<RouteOutcome> {
    const { store, footerText } = this.deps;

    const owner = await this.stored(store.getOwner(ownerId), 'getOwner');
    if (!owner) {
      return rejected('OwnerNotFound');
    }
    const conversation = await this.stored(store.findConversation(userId, ownerId), 'findConversation');
    if (!conversation) {
      return rejected('ConversationNotFound');
    }

    const transport = via ?? this.selectTransport(owner);
    const body = owner.mode.kind === 'dedicatedChannel' ? addFooter(text, footerText) : text;

    await this.stored(store.appendMessage(conversation.id, 'owner', text, 'text', null), 'appendMessage');

    try {
      const sent = await transportCall(
        transport.send(userId, replyText(owner.businessName, body)),
        this.deps.timeouts.transportMs,
        'Reply to user'
      );
      return { status: 'Delivered', conversationId: conversation.id, messageId: sent.messageId };
    } catch (error) {
      const failure = asTransportError(error);
      logger.warn({ err: failure, kind: failure.kind, ownerId, userId }, 'Failed to deliver owner reply');
      return { status: 'DeliveryFailed', error: failure };
    }
  }

  // A duplicate-key race on the pairing resolves to the row that won
  private async resolveConversation(userId: number, ownerId: number): Promise<Conversation> {
    const { store } = this.deps;
    try {
      return await this.stored(store.getOrCreateConversation(userId, ownerId), 'getOrCreateConversation');
    } catch (error) {
      if (!isConstraintViolation(error)) {
        throw error;
      }
      const existing = await this.stored(store.findConversation(userId, ownerId), 'findConversation');
      if (!existing) {
        throw error;
      }
      return existing;
    }
  }

  private async afterDelivery(
    operation: string,
    ownerId: number,
    userId: number,
    work: () => Promise<void>
  ): Promise<void> {
    try {
      await work();
    } catch (error) {
      logger.error({ err: error, ownerId, userId, operation }, 'Bookkeeping failed after delivery');
    }
  }

  private async guardStore(work: () => Promise<RouteOutcome>): Promise<RouteOutcome> {
    try {
      return await work();
    } catch (error) {
      if (isStoreTimeout(error)) {
        logger.error({ err: error }, 'Record store timed out');
        return rejected('StoreTimeout');
      }
      throw error;
    }
  }

  private stored<T>(work: Promise<T>, operation: string): Promise<T> {
    return storeCall(work, this.deps.timeouts.storeMs, operation);
  }

  private pairKey(userId: number, ownerId: number): string {
    return `${userId}:${ownerId}`;
  }
}
