import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export type ErrorDetails = Record<string, unknown>;

export class FeedRegistryError extends Error {
  public statusCode: number;
  public code: string;
  public details?: ErrorDetails;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR', details?: ErrorDetails) {
    super(message);
    this.name = 'FeedRegistryError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ArrayLengthMismatchError extends FeedRegistryError {
  constructor(firstLength: number, secondLength: number) {
    super('array lengths do not match', 400, 'ARRAY_LENGTH_MISMATCH', { firstLength, secondLength });
    this.name = 'ArrayLengthMismatchError';
  }
}

export class InvalidCategoryError extends FeedRegistryError {
  constructor(feedId: string) {
    super('invalid feed category', 400, 'INVALID_CATEGORY', { feedId });
    this.name = 'InvalidCategoryError';
  }
}

export class AlreadyExistsError extends FeedRegistryError {
  constructor(feedId: string) {
    super('feed already exists', 409, 'ALREADY_EXISTS', { feedId });
    this.name = 'AlreadyExistsError';
  }
}

export class NotFoundError extends FeedRegistryError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 404, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class SameIdentifierError extends FeedRegistryError {
  constructor(feedId: string) {
    super('feed ids are the same', 400, 'SAME_IDENTIFIER', { feedId });
    this.name = 'SameIdentifierError';
  }
}

export class AliasNotFoundError extends FeedRegistryError {
  constructor(feedId: string) {
    super('feed id change does not exist', 404, 'ALIAS_NOT_FOUND', { feedId });
    this.name = 'AliasNotFoundError';
  }
}

export class CalculatedFeedNotSupportedError extends FeedRegistryError {
  constructor(feedId: string) {
    super('calculated feed id not supported', 422, 'CALCULATED_FEED_NOT_SUPPORTED', { feedId });
    this.name = 'CalculatedFeedNotSupportedError';
  }
}

export class InvalidProofError extends FeedRegistryError {
  constructor(votingRoundId: number) {
    super('merkle proof invalid', 422, 'INVALID_PROOF', { votingRoundId });
    this.name = 'InvalidProofError';
  }
}

export class UnauthorizedError extends FeedRegistryError {
  constructor(caller: string) {
    super('only governance', 403, 'UNAUTHORIZED', { caller });
    this.name = 'UnauthorizedError';
  }
}

export class ArithmeticOverflowError extends FeedRegistryError {
  constructor(value: bigint, decimals: number) {
    super('arithmetic overflow', 422, 'ARITHMETIC_OVERFLOW', { value: value.toString(), decimals });
    this.name = 'ArithmeticOverflowError';
  }
}

export class InsufficientValueError extends FeedRegistryError {
  constructor(requested: bigint, available: bigint) {
    super('insufficient value for fee payment', 402, 'INSUFFICIENT_VALUE', {
      requested: requested.toString(),
      available: available.toString()
    });
    this.name = 'InsufficientValueError';
  }
}

export class ChainError extends FeedRegistryError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 503, 'CHAIN_ERROR', details);
    this.name = 'ChainError';
  }
}

export class ValidationError extends FeedRegistryError {
  constructor(message: string, field?: string) {
    super(message, 400, 'VALIDATION_ERROR', { field });
    this.name = 'ValidationError';
  }
}

interface ErrorLike {
  name?: string;
  message?: string;
  stack?: string;
  code?: string;
  reason?: string;
  type?: string;
}

function stringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function describe(error: unknown): ErrorLike {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code: stringField(error, 'code'),
      reason: stringField(error, 'reason'),
      type: stringField(error, 'type')
    };
  }
  return { message: String(error) };
}

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const info = describe(error);

  if (error instanceof FeedRegistryError) {
    logger.warn('Request rejected', {
      error: { name: info.name, message: info.message, code: error.code },
      request: { method: req.method, url: req.url }
    });

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error.details && { details: error.details })
      },
      timestamp: new Date().toISOString()
    });
    return;
  }

  logger.error('Request failed', {
    error: info,
    request: {
      method: req.method,
      url: req.url,
      ip: req.ip,
      userAgent: req.get('User-Agent')
    }
  });

  // ethers.js errors
  if (info.code === 'CALL_EXCEPTION' || info.code === 'NETWORK_ERROR') {
    res.status(503).json({
      success: false,
      error: {
        code: 'BLOCKCHAIN_ERROR',
        message: 'Blockchain network error',
        details: info.reason || info.message
      },
      timestamp: new Date().toISOString()
    });
    return;
  }

  // body-parser rejects malformed JSON with this type
  if (info.type === 'entity.parse.failed') {
    res.status(400).json({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body'
      },
      timestamp: new Date().toISOString()
    });
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error'
    },
    timestamp: new Date().toISOString()
  });
};
