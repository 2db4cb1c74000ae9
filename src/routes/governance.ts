import express from 'express';
import { FeedRegistryService } from '../services/feeds/feedRegistryService';
import { CalculatedFeed } from '../services/feeds/feedTypes';
import { logger } from '../utils/logger';
import { ValidationError } from '../middleware/errorHandler';
import { requireAddresses, requireBody, requireFeedIds } from './validation';

export type CalculatedFeedFactory = (address: string) => CalculatedFeed;

const CALLER_HEADER = 'x-caller-address';

function requireCaller(req: express.Request): string {
  const caller = req.get(CALLER_HEADER);
  if (!caller) {
    throw new ValidationError(`${CALLER_HEADER} header is required`, CALLER_HEADER);
  }
  return caller;
}

/**
 * Governance-only registry changes. The caller is identified by the
 * x-caller-address header and checked by the registry's authorization gate.
 */
export function createGovernanceRoutes(
  registry: FeedRegistryService,
  calculatedFeedFactory: CalculatedFeedFactory
): express.Router {
  const router = express.Router();

  /**
   * @swagger
   * /api/v1/governance/feed-ids:
   *   post:
   *     summary: Change feed ids; a zero new id removes the change
   *     tags: [Governance]
   *     parameters:
   *       - in: header
   *         name: x-caller-address
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - oldFeedIds
   *               - newFeedIds
   *             properties:
   *               oldFeedIds:
   *                 type: array
   *                 items:
   *                   type: string
   *               newFeedIds:
   *                 type: array
   *                 items:
   *                   type: string
   *     responses:
   *       200:
   *         description: Changes applied
   *       403:
   *         description: Caller is not governance
   */
  router.post('/feed-ids', async (req, res, next) => {
    try {
      const caller = requireCaller(req);
      const body = requireBody(req.body);
      const oldFeedIds = requireFeedIds(body.oldFeedIds, 'oldFeedIds');
      const newFeedIds = requireFeedIds(body.newFeedIds, 'newFeedIds');

      await registry.changeFeedIds(caller, oldFeedIds, newFeedIds);

      res.json({
        success: true,
        data: await registry.getFeedIdChanges(),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/governance/calculated-feeds:
   *   post:
   *     summary: Register calculated feed contracts
   *     tags: [Governance]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               addresses:
   *                 type: array
   *                 items:
   *                   type: string
   *   put:
   *     summary: Replace the contracts of registered calculated feeds
   *     tags: [Governance]
   *   delete:
   *     summary: Remove calculated feeds by feed id
   *     tags: [Governance]
   */
  router.post('/calculated-feeds', async (req, res, next) => {
    try {
      const caller = requireCaller(req);
      const addresses = requireAddresses(requireBody(req.body).addresses, 'addresses');

      logger.info('Calculated feed registration requested', { caller, addresses });
      await registry.addCalculatedFeeds(caller, addresses.map(calculatedFeedFactory));

      res.status(201).json({
        success: true,
        data: await registry.getCalculatedFeeds(),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/calculated-feeds', async (req, res, next) => {
    try {
      const caller = requireCaller(req);
      const addresses = requireAddresses(requireBody(req.body).addresses, 'addresses');

      logger.info('Calculated feed replacement requested', { caller, addresses });
      await registry.replaceCalculatedFeeds(caller, addresses.map(calculatedFeedFactory));

      res.json({
        success: true,
        data: await registry.getCalculatedFeeds(),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/calculated-feeds', async (req, res, next) => {
    try {
      const caller = requireCaller(req);
      const feedIds = requireFeedIds(requireBody(req.body).feedIds, 'feedIds');

      logger.info('Calculated feed removal requested', { caller, feedIds });
      await registry.removeCalculatedFeeds(caller, feedIds);

      res.json({
        success: true,
        data: await registry.getCalculatedFeeds(),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
