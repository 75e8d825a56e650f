import logger from '../config/logger';
import type { QuotaSettings } from '../config/settings';
import { FRONT_DOOR_DEEP_LINK_PREFIX } from '../common/constants';
import { parseOwnerId, storeCall, transportCall } from '../common/functions';
import { addFooter } from '../templates/footer';
import {
  ALREADY_REGISTERED,
  DELIVERY_FAILED,
  INTRO_MESSAGE,
  MESSAGE_SENT,
  NO_OWNER_SELECTED,
  REPLY_FAILED,
  REPLY_SENT,
  REPLY_TARGET_UNKNOWN,
  TRIAL_ENDED_NOTICE,
  onboardingCompleteText,
  onboardingProblemText,
  onboardingPrompt,
  registrationText,
  rejectionText,
  shareLink,
  welcomeText
} from '../templates/messages';
import { OwnerActionRejected } from '../services/lifecycle.service';
import type { MessageRouter, RouteOutcome, UserMessage } from '../services/messageRouter.service';
import { parseRegistrationMode } from '../services/onboarding.service';
import type { OnboardingProblem, OnboardingService } from '../services/onboarding.service';
import type { PolicyService } from '../services/policy.service';
import type { RecordStore } from '../types/store.types';
import type { Owner } from '../types/relay.types';
import type { ChannelTransport, InboundEvent, InboundHandler } from './channel.types';

export interface InboundDispatcherDeps {
  store: RecordStore;
  router: MessageRouter;
  onboarding: OnboardingService;
  policy: PolicyService;
  quota: QuotaSettings;
  /** Username of the front-door bot, used in share links. */
  frontDoorUsername: string;
  footerText: string;
  timeouts: { storeMs: number; transportMs: number };
  clock?: () => Date;
}

type Direction = 'toOwner' | 'toUser';

/**
 * Turns transport events into router calls and answers the sender with the
 * outcome. Front-door users pick an owner through a `/start owner_<id>` link;
 * a dedicated bot always addresses its own owner. Owners register on the
 * front door with `/register` (or `/register own` for a dedicated bot).
 */
export class InboundDispatcher {
  // front-door user id -> owner id they are talking to
  private readonly sessions = new Map<number, number>();
  private readonly clock: () => Date;

  constructor(private readonly deps: InboundDispatcherDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  frontDoorHandler(transport: ChannelTransport): InboundHandler {
    return (event) => this.handleFrontDoor(transport, event);
  }

  dedicatedHandler(ownerId: number, transport: ChannelTransport): InboundHandler {
    return (event) => this.handleDedicated(ownerId, transport, event);
  }

  private async handleFrontDoor(transport: ChannelTransport, event: InboundEvent): Promise<void> {
    if (event.command?.name === 'start') {
      await this.startFrontDoor(transport, event);
      return;
    }
    if (event.command?.name === 'register') {
      await this.startRegistration(transport, event);
      return;
    }

    // a reply to a forwarded message is an owner answering; anything else is a user writing
    if (event.replyToMessageId !== null) {
      const outcome = await this.deps.router.routeOwnerReplyToForward(
        event.senderId,
        transport,
        event.replyToMessageId,
        event.text
      );
      if (!this.isUnmappedReply(outcome)) {
        await this.answer(transport, event, this.outcomeText(outcome, 'toUser'));
        return;
      }
    }

    const ownerId = this.sessions.get(event.senderId);
    if (ownerId === undefined) {
      if (!(await this.continueOnboarding(transport, event))) {
        await this.answer(transport, event, NO_OWNER_SELECTED);
      }
      return;
    }

    const outcome = await this.deps.router.routeUserMessage(this.userMessage(ownerId, transport, event));
    await this.answer(transport, event, this.outcomeText(outcome, 'toOwner'));
  }

  private async handleDedicated(ownerId: number, transport: ChannelTransport, event: InboundEvent): Promise<void> {
    const withFooter = (text: string) => addFooter(text, this.deps.footerText);

    if (event.command?.name === 'start') {
      await this.answer(transport, event, withFooter(await this.dedicatedWelcome(ownerId, event)));
      return;
    }

    if (event.senderId === ownerId) {
      if (event.replyToMessageId === null) {
        await this.answer(transport, event, REPLY_TARGET_UNKNOWN);
        return;
      }
      const outcome = await this.deps.router.routeOwnerReplyToForward(ownerId, transport, event.replyToMessageId, event.text);
      await this.answer(transport, event, this.outcomeText(outcome, 'toUser'));
      return;
    }

    const outcome = await this.deps.router.routeUserMessage(this.userMessage(ownerId, transport, event));
    await this.answer(transport, event, withFooter(this.outcomeText(outcome, 'toOwner')));
  }

  private async startFrontDoor(transport: ChannelTransport, event: InboundEvent): Promise<void> {
    const { store, timeouts } = this.deps;
    await storeCall(store.upsertUser(event.senderId, event.senderName, event.senderUsername), timeouts.storeMs, 'upsertUser');

    const payload = event.command?.payload ?? '';
    const ownerId = payload.startsWith(FRONT_DOOR_DEEP_LINK_PREFIX)
      ? parseOwnerId(payload.slice(FRONT_DOOR_DEEP_LINK_PREFIX.length))
      : null;

    if (ownerId !== null) {
      const owner = await storeCall(store.getOwner(ownerId), timeouts.storeMs, 'getOwner');
      if (owner && owner.isActive) {
        this.sessions.set(event.senderId, ownerId);
        logger.info({ userId: event.senderId, ownerId }, 'User connected to owner');
        await this.answer(transport, event, welcomeText(owner.businessName, owner.bio));
        return;
      }
    }

    await this.answer(transport, event, INTRO_MESSAGE);
  }

  private async startRegistration(transport: ChannelTransport, event: InboundEvent): Promise<void> {
    const mode = parseRegistrationMode(event.command?.payload ?? '');
    this.sessions.delete(event.senderId);
    try {
      await this.deps.onboarding.register(event.senderId, event.senderUsername, mode);
    } catch (error) {
      if (error instanceof OwnerActionRejected && error.reason === 'AlreadyRegistered') {
        await this.answer(transport, event, ALREADY_REGISTERED);
        return;
      }
      throw error;
    }
    await this.answer(transport, event, registrationText(mode, this.deps.quota, this.deps.policy.trialDays));
  }

  // false when the sender has no registration in progress
  private async continueOnboarding(transport: ChannelTransport, event: InboundEvent): Promise<boolean> {
    const { store, onboarding, timeouts } = this.deps;
    const owner = await storeCall(store.getOwner(event.senderId), timeouts.storeMs, 'getOwner');
    if (!owner || owner.onboardingStep === 'done') {
      return false;
    }

    const result = await onboarding.submit(owner.id, {
      text: event.text,
      fileId: event.fileId,
      skip: event.command?.name === 'skip'
    });
    await this.answer(transport, event, this.onboardingReply(result.owner, result.problem));
    return true;
  }

  private onboardingReply(owner: Owner, problem: OnboardingProblem | null): string {
    if (problem !== null) {
      return onboardingProblemText(problem);
    }
    if (owner.onboardingStep !== 'done') {
      return onboardingPrompt(owner.onboardingStep);
    }
    const ownBot = owner.mode.kind === 'dedicatedChannel' ? owner.mode.botUsername : null;
    return onboardingCompleteText(owner, shareLink(ownBot ?? this.deps.frontDoorUsername, owner.id));
  }

  private async dedicatedWelcome(ownerId: number, event: InboundEvent): Promise<string> {
    const { store, policy, timeouts } = this.deps;
    await storeCall(store.upsertUser(event.senderId, event.senderName, event.senderUsername), timeouts.storeMs, 'upsertUser');

    const owner = await storeCall(store.getOwner(ownerId), timeouts.storeMs, 'getOwner');
    if (!owner || !owner.isActive) {
      return rejectionText(owner ? 'OwnerInactive' : 'OwnerNotFound', this.deps.quota);
    }
    if (owner.mode.kind === 'dedicatedChannel' && !policy.evaluateTrial(owner.mode.trial, this.clock()).allowed) {
      return TRIAL_ENDED_NOTICE;
    }
    return welcomeText(owner.businessName, owner.bio);
  }

  private userMessage(ownerId: number, transport: ChannelTransport, event: InboundEvent): UserMessage {
    return {
      ownerId,
      userId: event.senderId,
      userName: event.senderName,
      username: event.senderUsername,
      text: event.text,
      kind: event.kind,
      originId: event.messageId,
      via: transport
    };
  }

  private isUnmappedReply(outcome: RouteOutcome): boolean {
    return outcome.status === 'Rejected' && outcome.reason === 'ConversationNotFound';
  }

  private outcomeText(outcome: RouteOutcome, direction: Direction): string {
    switch (outcome.status) {
      case 'Delivered':
        return direction === 'toOwner' ? MESSAGE_SENT : REPLY_SENT;
      case 'Rejected':
        return rejectionText(outcome.reason, this.deps.quota);
      case 'DeliveryFailed':
        return direction === 'toOwner' ? DELIVERY_FAILED : REPLY_FAILED;
    }
  }

  // Acknowledgements are best effort; the routed message is already persisted
  private async answer(transport: ChannelTransport, event: InboundEvent, text: string): Promise<void> {
    try {
      await transportCall(transport.send(event.chatId, text), this.deps.timeouts.transportMs, 'Answer sender');
    } catch (error) {
      logger.warn({ err: error, chatId: event.chatId }, 'Failed to answer sender');
    }
  }
}
