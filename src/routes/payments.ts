import express from 'express';
import { PaymentJournal, PaymentOperation } from '../services/paymentJournal';
import { ValidationError } from '../middleware/errorHandler';

const OPERATIONS: readonly PaymentOperation[] = [
  'getFeedById',
  'getFeedsById',
  'getFeedByIdInWei',
  'getFeedsByIdInWei',
  'getFeedByIndex',
  'getFeedsByIndex',
  'getFeedByIndexInWei',
  'getFeedsByIndexInWei'
];

function isPaymentOperation(value: unknown): value is PaymentOperation {
  return OPERATIONS.some(operation => operation === value);
}

export function createPaymentRoutes(journal: PaymentJournal): express.Router {
  const router = express.Router();

  /**
   * @swagger
   * /api/v1/payments:
   *   get:
   *     summary: Recent fee payments, newest first
   *     tags: [Payments]
   *     parameters:
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           default: 20
   *       - in: query
   *         name: operation
   *         schema:
   *           type: string
   */
  router.get('/', (req, res, next) => {
    try {
      const { limit = '20', operation } = req.query;
      const parsedLimit = typeof limit === 'string' ? parseInt(limit) : NaN;
      if (!Number.isInteger(parsedLimit) || parsedLimit < 1 || parsedLimit > 100) {
        throw new ValidationError('limit must be between 1 and 100', 'limit');
      }
      if (operation !== undefined && !isPaymentOperation(operation)) {
        throw new ValidationError(`Invalid operation. Must be one of: ${OPERATIONS.join(', ')}`, 'operation');
      }

      const payments = journal.getRecentPayments(parsedLimit, operation);

      res.json({
        success: true,
        data: payments,
        count: payments.length,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/payments/stats:
   *   get:
   *     summary: Totals received and forwarded over the recorded payments
   *     tags: [Payments]
   */
  router.get('/stats', (req, res) => {
    res.json({
      success: true,
      data: journal.getPaymentStats(),
      timestamp: new Date().toISOString()
    });
  });

  /**
   * @swagger
   * /api/v1/payments/{id}:
   *   get:
   *     summary: A single fee payment
   *     tags: [Payments]
   */
  router.get('/:id', (req, res) => {
    const payment = journal.getPaymentById(req.params.id);

    if (!payment) {
      res.status(404).json({
        success: false,
        error: {
          code: 'PAYMENT_NOT_FOUND',
          message: `Payment ${req.params.id} not found`
        },
        timestamp: new Date().toISOString()
      });
      return;
    }

    res.json({
      success: true,
      data: payment,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
