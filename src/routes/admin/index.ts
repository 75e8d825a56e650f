import { Router } from 'express';
import { requireAdmin } from '../../middleware/auth.middleware';
import { createAdminController } from './controller';
import type { AdminContext } from './controller';

export interface AdminAuth {
  secret: string;
  adminIds: readonly number[];
}

export const createAdminRouter = (ctx: AdminContext, auth: AdminAuth): Router => {
  const router = Router();
  const controller = createAdminController(ctx);

  router.use(requireAdmin(auth.secret, auth.adminIds));

  router.get('/stats', controller.getStatsRoute);                                    // Totals across owners, users and live bots
  router.get('/owners', controller.listOwnersRoute);                                 // Every owner with mode, trial and running flag
  router.post('/owners', controller.createOwnerRoute);                               // Register an owner, shared or dedicated
  router.get('/owners/:ownerId/messages', controller.getOwnerMessagesRoute);         // Recent messages, ?category=order|support|query|other|all
  router.post('/owners/:ownerId/pause', controller.pauseOwnerRoute);                 // Deactivate and stop the dedicated bot
  router.post('/owners/:ownerId/resume', controller.resumeOwnerRoute);               // Reactivate and restart when eligible
  router.post('/owners/:ownerId/credential', controller.assignCredentialRoute);      // Switch to a dedicated bot token
  router.post('/trials/check', controller.checkTrialsRoute);                         // Run the trial sweep now
  router.post('/cleanup', controller.runCleanupRoute);                               // Run the retention sweep now
  router.get('/cleanup/stats', controller.getCleanupStatsRoute);
  router.post('/broadcast', controller.broadcastRoute);                              // { target, text } over the front door

  return router;
};
