import express from 'express';
import { FeedRegistryService } from '../services/feeds/feedRegistryService';
import { logger } from '../utils/logger';
import { ValidationError } from '../middleware/errorHandler';
import {
  optionalValue,
  requireBody,
  requireFeedDataWithProof,
  requireFeedSelector,
  requireIndex
} from './validation';

/**
 * @swagger
 * components:
 *   schemas:
 *     FeedSelector:
 *       type: object
 *       description: Exactly one of feedId, feedIds, index or indices
 *       properties:
 *         feedId:
 *           type: string
 *           example: "0x014254432f55534400000000000000000000000000"
 *         feedIds:
 *           type: array
 *           items:
 *             type: string
 *         index:
 *           type: integer
 *         indices:
 *           type: array
 *           items:
 *             type: integer
 *
 *     FeedDataWithProof:
 *       type: object
 *       required:
 *         - proof
 *         - body
 *       properties:
 *         proof:
 *           type: array
 *           items:
 *             type: string
 *         body:
 *           type: object
 *           properties:
 *             votingRoundId:
 *               type: integer
 *             id:
 *               type: string
 *             value:
 *               type: integer
 *             turnoutBIPS:
 *               type: integer
 *             decimals:
 *               type: integer
 */
export function createFeedRoutes(registry: FeedRegistryService): express.Router {
  const router = express.Router();

  /**
   * @swagger
   * /api/v1/feeds:
   *   get:
   *     summary: List every supported feed id (index-addressed and calculated)
   *     tags: [Feeds]
   *     responses:
   *       200:
   *         description: Supported feed ids
   */
  router.get('/', async (req, res, next) => {
    try {
      const feedIds = await registry.getSupportedFeedIds();

      res.json({
        success: true,
        data: feedIds,
        count: feedIds.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/changes:
   *   get:
   *     summary: List feed id changes (old id to new id)
   *     tags: [Feeds]
   */
  router.get('/changes', async (req, res, next) => {
    try {
      const changes = await registry.getFeedIdChanges();

      res.json({
        success: true,
        data: changes,
        count: changes.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/calculated:
   *   get:
   *     summary: List calculated feeds with their contract addresses
   *     tags: [Feeds]
   */
  router.get('/calculated', async (req, res, next) => {
    try {
      const feeds = await registry.getCalculatedFeeds();

      res.json({
        success: true,
        data: feeds,
        count: feeds.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/index/{index}:
   *   get:
   *     summary: Feed id configured at an index (zero id when unused)
   *     tags: [Feeds]
   *     parameters:
   *       - in: path
   *         name: index
   *         required: true
   *         schema:
   *           type: integer
   */
  router.get('/index/:index', async (req, res, next) => {
    try {
      const index = requireIndex(req.params.index, 'index');
      const feedId = await registry.getFeedId(index);

      res.json({
        success: true,
        data: { index, feedId },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/{feedId}/index:
   *   get:
   *     summary: Index of a feed id, after applying feed id changes
   *     tags: [Feeds]
   *     parameters:
   *       - in: path
   *         name: feedId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Feed index
   *       404:
   *         description: Feed does not exist
   */
  router.get('/:feedId/index', async (req, res, next) => {
    try {
      const index = await registry.getFeedIndex(req.params.feedId);

      res.json({
        success: true,
        data: { feedId: req.params.feedId.toLowerCase(), index },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/fetch:
   *   post:
   *     summary: Fetch current feed values, paying the attached value as fee
   *     tags: [Feeds]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             allOf:
   *               - $ref: '#/components/schemas/FeedSelector'
   *               - type: object
   *                 properties:
   *                   value:
   *                     type: string
   *                     description: Attached payment in wei
   *                   inWei:
   *                     type: boolean
   *                     description: Return values scaled to 18 decimals
   *     responses:
   *       200:
   *         description: Feed values in request order
   *       422:
   *         description: Calculated feed not supported
   */
  router.post('/fetch', async (req, res, next) => {
    try {
      const body = requireBody(req.body);
      const selector = requireFeedSelector(body);
      const value = optionalValue(body.value);
      if (body.inWei !== undefined && typeof body.inWei !== 'boolean') {
        throw new ValidationError('inWei must be a boolean', 'inWei');
      }
      const inWei = body.inWei === true;

      logger.info('Feed fetch request received', { selector: selector.kind, value, inWei, ip: req.ip });

      let data: object;
      switch (selector.kind) {
        case 'feedId':
          data = inWei
            ? await registry.getFeedByIdInWei(selector.feedId, value)
            : await registry.getFeedById(selector.feedId, value);
          break;
        case 'feedIds':
          data = inWei
            ? await registry.getFeedsByIdInWei(selector.feedIds, value)
            : await registry.getFeedsById(selector.feedIds, value);
          break;
        case 'index':
          data = inWei
            ? await registry.getFeedByIndexInWei(selector.index, value)
            : await registry.getFeedByIndex(selector.index, value);
          break;
        default:
          data = inWei
            ? await registry.getFeedsByIndexInWei(selector.indices, value)
            : await registry.getFeedsByIndex(selector.indices, value);
          break;
      }

      res.json({
        success: true,
        data,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/fee:
   *   post:
   *     summary: Quote the fee for fetching the selected feeds
   *     tags: [Feeds]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/FeedSelector'
   */
  router.post('/fee', async (req, res, next) => {
    try {
      const selector = requireFeedSelector(requireBody(req.body));

      let fee: bigint;
      switch (selector.kind) {
        case 'feedId':
          fee = await registry.calculateFeeById(selector.feedId);
          break;
        case 'feedIds':
          fee = await registry.calculateFeeByIds(selector.feedIds);
          break;
        case 'index':
          fee = await registry.calculateFeeByIndex(selector.index);
          break;
        default:
          fee = await registry.calculateFeeByIndices(selector.indices);
          break;
      }

      res.json({
        success: true,
        data: { fee },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/feeds/verify:
   *   post:
   *     summary: Verify feed data against the Merkle root published for its voting round
   *     tags: [Feeds]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/FeedDataWithProof'
   *     responses:
   *       200:
   *         description: Proof is valid
   *       422:
   *         description: Merkle proof invalid
   */
  router.post('/verify', async (req, res, next) => {
    try {
      const feedData = requireFeedDataWithProof(requireBody(req.body));
      const verified = await registry.verifyFeedData(feedData);

      res.json({
        success: true,
        data: { verified, votingRoundId: feedData.body.votingRoundId, feedId: feedData.body.id },
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
