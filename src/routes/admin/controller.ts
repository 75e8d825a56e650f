import type { Request, Response } from 'express';
import sendHTTPResponse from '../../common/sendHTTPResponse';
import logger from '../../config/logger';
import { TransportError, isStoreTimeout } from '../../common/errors';
import { parseOwnerId, storeCall } from '../../common/functions';
import { OwnerActionRejected } from '../../services/lifecycle.service';
import type { LifecycleOrchestrator } from '../../services/lifecycle.service';
import { MessageFilter } from '../../services/messageFilter.service';
import { ProfileRejected } from '../../services/onboarding.service';
import type { OnboardingService } from '../../services/onboarding.service';
import { BroadcastService } from '../../services/broadcast.service';
import type { CleanupService } from '../../services/cleanup.service';
import type { TenantRegistry } from '../../services/tenantRegistry.service';
import type { TrialService } from '../../services/trial.service';
import type { RecordStore } from '../../types/store.types';
import type { Owner } from '../../types/relay.types';

export interface AdminContext {
  store: RecordStore;
  registry: TenantRegistry;
  lifecycle: LifecycleOrchestrator;
  onboarding: OnboardingService;
  trials: TrialService;
  cleanup: CleanupService;
  broadcasts: BroadcastService;
  storeTimeoutMs: number;
  clock?: () => Date;
}

const DEFAULT_MESSAGE_LIMIT = 50;

const isOptionalString = (value: unknown): value is string | null | undefined =>
  value === undefined || value === null || typeof value === 'string';

// Maps a failed admin action to an HTTP status
const sendFailure = (res: Response, error: unknown, action: string) => {
  if (error instanceof ProfileRejected) {
    return sendHTTPResponse.error(res, 400, error.message, { problem: error.problem });
  }
  if (error instanceof OwnerActionRejected) {
    const status = error.reason === 'OwnerNotFound' ? 404 : 409;
    return sendHTTPResponse.error(res, status, error.message, { reason: error.reason });
  }
  if (error instanceof TransportError) {
    const status = error.kind === 'InvalidCredential' ? 422 : 502;
    return sendHTTPResponse.error(res, status, error.message, { kind: error.kind });
  }
  if (isStoreTimeout(error)) {
    return sendHTTPResponse.error(res, 503, 'Record store timed out');
  }
  logger.error({ err: error }, `Error while trying to ${action}`);
  return sendHTTPResponse.error(res, 500, 'Internal server error');
};

export const createAdminController = (ctx: AdminContext) => {
  const now = () => (ctx.clock ? ctx.clock() : new Date());
  const stored = <T>(work: Promise<T>, operation: string) => storeCall(work, ctx.storeTimeoutMs, operation);

  const describeOwner = (owner: Owner) => ({
    id: owner.id,
    username: owner.username,
    businessName: owner.businessName,
    category: owner.category,
    mode: owner.mode.kind,
    botUsername: owner.mode.kind === 'dedicatedChannel' ? owner.mode.botUsername : null,
    isActive: owner.isActive,
    onboardingStep: owner.onboardingStep,
    trial: ctx.trials.getTrialStatus(owner, now()),
    running: ctx.registry.has(owner.id),
  });

  // Overall counts for the dashboard
  const getStatsRoute = async (_req: Request, res: Response) => {
    try {
      const [owners, userIds] = await Promise.all([
        stored(ctx.store.listOwners(), 'listOwners'),
        stored(ctx.store.listUserIds(), 'listUserIds'),
      ]);

      return sendHTTPResponse.success(res, 200, 'Stats fetched', {
        owners: owners.length,
        dedicatedOwners: owners.filter((owner) => owner.mode.kind === 'dedicatedChannel').length,
        activeOwners: owners.filter((owner) => owner.isActive).length,
        users: userIds.length,
        runningTenants: ctx.registry.size,
      });
    } catch (error) {
      return sendFailure(res, error, 'fetch stats');
    }
  };

  const listOwnersRoute = async (_req: Request, res: Response) => {
    try {
      const owners = await stored(ctx.store.listOwners(), 'listOwners');
      return sendHTTPResponse.success(res, 200, 'Owners fetched', owners.map(describeOwner));
    } catch (error) {
      return sendFailure(res, error, 'list owners');
    }
  };

  // Recent messages of one owner, optionally narrowed to a keyword category
  const getOwnerMessagesRoute = async (req: Request, res: Response) => {
    const ownerId = parseOwnerId(req.params.ownerId);
    if (ownerId === null) {
      return sendHTTPResponse.error(res, 400, 'Invalid owner id');
    }
    const category = req.query.category ?? 'all';
    if (!MessageFilter.isCategoryFilter(category)) {
      return sendHTTPResponse.error(res, 400, 'Invalid category');
    }
    const limit = Number(req.query.limit ?? DEFAULT_MESSAGE_LIMIT);
    if (!Number.isInteger(limit) || limit < 1) {
      return sendHTTPResponse.error(res, 400, 'Invalid limit');
    }

    try {
      const owner = await stored(ctx.store.getOwner(ownerId), 'getOwner');
      if (!owner) {
        return sendHTTPResponse.error(res, 404, 'Owner not found');
      }
      const [stats, messages] = await Promise.all([
        stored(ctx.store.getOwnerStats(ownerId), 'getOwnerStats'),
        stored(ctx.store.listRecentMessages(ownerId, limit), 'listRecentMessages'),
      ]);

      return sendHTTPResponse.success(res, 200, 'Messages fetched', {
        owner: describeOwner(owner),
        stats,
        category,
        messages: MessageFilter.filterMessages(messages, category).map((message) => ({
          ...message,
          category: MessageFilter.categorize(message.text),
        })),
      });
    } catch (error) {
      return sendFailure(res, error, 'fetch owner messages');
    }
  };

  // Registers an owner with a full profile; a dedicated owner may hand over its bot token at once
  const createOwnerRoute = async (req: Request, res: Response) => {
    const rawId: unknown = req.body?.ownerId;
    const ownerId = typeof rawId === 'number' || typeof rawId === 'string' ? parseOwnerId(String(rawId)) : null;
    if (ownerId === null) {
      return sendHTTPResponse.error(res, 400, 'Invalid owner id');
    }
    const mode: unknown = req.body?.mode ?? 'shared';
    if (mode !== 'shared' && mode !== 'dedicated') {
      return sendHTTPResponse.error(res, 400, 'Mode must be shared or dedicated');
    }
    const businessName: unknown = req.body?.businessName;
    if (typeof businessName !== 'string') {
      return sendHTTPResponse.error(res, 400, 'Business name is required');
    }
    const username: unknown = req.body?.username;
    const category: unknown = req.body?.category;
    const bio: unknown = req.body?.bio;
    const token: unknown = req.body?.token;
    if (!isOptionalString(username) || !isOptionalString(category) || !isOptionalString(bio) || !isOptionalString(token)) {
      return sendHTTPResponse.error(res, 400, 'Owner fields must be strings');
    }
    const credential = token?.trim() || null;
    if (credential !== null && mode !== 'dedicated') {
      return sendHTTPResponse.error(res, 400, 'A bot token needs dedicated mode');
    }

    try {
      const owner = await ctx.onboarding.createOwner({
        ownerId,
        username: username ?? null,
        mode,
        businessName,
        category: category ?? null,
        bio: bio ?? null,
        credential,
      });
      return sendHTTPResponse.success(res, 201, 'Owner created', describeOwner(owner));
    } catch (error) {
      return sendFailure(res, error, 'create owner');
    }
  };

  const pauseOwnerRoute = async (req: Request, res: Response) => {
    const ownerId = parseOwnerId(req.params.ownerId);
    if (ownerId === null) {
      return sendHTTPResponse.error(res, 400, 'Invalid owner id');
    }
    try {
      const owner = await ctx.lifecycle.pause(ownerId);
      return sendHTTPResponse.success(res, 200, 'Owner paused', describeOwner(owner));
    } catch (error) {
      return sendFailure(res, error, 'pause owner');
    }
  };

  const resumeOwnerRoute = async (req: Request, res: Response) => {
    const ownerId = parseOwnerId(req.params.ownerId);
    if (ownerId === null) {
      return sendHTTPResponse.error(res, 400, 'Invalid owner id');
    }
    try {
      const { owner } = await ctx.lifecycle.resume(ownerId);
      return sendHTTPResponse.success(res, 200, 'Owner resumed', describeOwner(owner));
    } catch (error) {
      return sendFailure(res, error, 'resume owner');
    }
  };

  // Switches the owner to a dedicated bot and starts it
  const assignCredentialRoute = async (req: Request, res: Response) => {
    const ownerId = parseOwnerId(req.params.ownerId);
    if (ownerId === null) {
      return sendHTTPResponse.error(res, 400, 'Invalid owner id');
    }
    const token: unknown = req.body?.token;
    if (typeof token !== 'string' || token.trim() === '') {
      return sendHTTPResponse.error(res, 400, 'Bot token is required');
    }

    try {
      const { owner } = await ctx.lifecycle.assignCredential(ownerId, token.trim());
      return sendHTTPResponse.success(res, 200, 'Dedicated bot started', describeOwner(owner));
    } catch (error) {
      return sendFailure(res, error, 'assign bot token');
    }
  };

  const checkTrialsRoute = async (_req: Request, res: Response) => {
    try {
      const result = await ctx.lifecycle.checkTrials(now());
      return sendHTTPResponse.success(res, 200, 'Trial check completed', result);
    } catch (error) {
      return sendFailure(res, error, 'check trials');
    }
  };

  const runCleanupRoute = async (_req: Request, res: Response) => {
    const result = await ctx.cleanup.runDailyCleanup(now());
    if (result.errors.length > 0) {
      return sendHTTPResponse.error(res, 500, 'Cleanup failed', result);
    }
    return sendHTTPResponse.success(res, 200, 'Cleanup completed', result);
  };

  const getCleanupStatsRoute = (_req: Request, res: Response) =>
    sendHTTPResponse.success(res, 200, 'Cleanup stats fetched', ctx.cleanup.getCleanupStats(now()));

  const broadcastRoute = async (req: Request, res: Response) => {
    const target: unknown = req.body?.target;
    const text: unknown = req.body?.text;
    if (!BroadcastService.isTarget(target)) {
      return sendHTTPResponse.error(res, 400, 'Invalid broadcast target');
    }
    if (typeof text !== 'string' || text.trim() === '') {
      return sendHTTPResponse.error(res, 400, 'Broadcast text is required');
    }

    try {
      const result = await ctx.broadcasts.broadcast(target, text);
      return sendHTTPResponse.success(res, 200, 'Broadcast finished', result);
    } catch (error) {
      return sendFailure(res, error, 'broadcast');
    }
  };

  return {
    getStatsRoute,
    listOwnersRoute,
    getOwnerMessagesRoute,
    createOwnerRoute,
    pauseOwnerRoute,
    resumeOwnerRoute,
    assignCredentialRoute,
    checkTrialsRoute,
    runCleanupRoute,
    getCleanupStatsRoute,
    broadcastRoute,
  };
};
