/**
 * Stock Error Utilities
 *
 * Error codes, user-facing messages, the StockError hierarchy and result helpers.
 * Every failure the engine reports maps to exactly one code below.
 */

import type { ZodError } from 'zod';

// ============================================
// ERROR CODES
// ============================================

export const STOCK_ERROR_CODES = {
  // Input
  VALIDATION: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',

  // Business rules
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  ALREADY_REPLACED: 'ALREADY_REPLACED',
  SALE_MISMATCH: 'SALE_MISMATCH',

  // State conflicts
  DUPLICATE: 'DUPLICATE',
  PRODUCT_IN_USE: 'PRODUCT_IN_USE',

  // Infrastructure
  STORAGE: 'STORAGE_ERROR',
} as const;

export type StockErrorCode = (typeof STOCK_ERROR_CODES)[keyof typeof STOCK_ERROR_CODES];

// ============================================
// USER-FACING MESSAGES
// ============================================

export const STOCK_ERROR_MESSAGES: Record<StockErrorCode, string> = {
  [STOCK_ERROR_CODES.VALIDATION]: 'The request contains invalid values',
  [STOCK_ERROR_CODES.NOT_FOUND]: 'The requested record does not exist',
  [STOCK_ERROR_CODES.INSUFFICIENT_STOCK]: 'Not enough stock for this operation',
  [STOCK_ERROR_CODES.ALREADY_REPLACED]: 'This damage entry has already been replaced',
  [STOCK_ERROR_CODES.SALE_MISMATCH]: 'Selected sale does not match product, quantity, or discount',
  [STOCK_ERROR_CODES.DUPLICATE]: 'A record with this value already exists',
  [STOCK_ERROR_CODES.PRODUCT_IN_USE]: 'Product is referenced by sales, damages or invoices',
  [STOCK_ERROR_CODES.STORAGE]: 'The stock store could not complete the operation',
};

/** HTTP status per code; 422 marks a well-formed request that breaks a stock rule */
export const STOCK_ERROR_HTTP_STATUS: Record<StockErrorCode, number> = {
  [STOCK_ERROR_CODES.VALIDATION]: 400,
  [STOCK_ERROR_CODES.NOT_FOUND]: 404,
  [STOCK_ERROR_CODES.INSUFFICIENT_STOCK]: 422,
  [STOCK_ERROR_CODES.ALREADY_REPLACED]: 422,
  [STOCK_ERROR_CODES.SALE_MISMATCH]: 422,
  [STOCK_ERROR_CODES.DUPLICATE]: 409,
  [STOCK_ERROR_CODES.PRODUCT_IN_USE]: 409,
  [STOCK_ERROR_CODES.STORAGE]: 500,
};

function getStockErrorMessage(code: StockErrorCode): string {
  return STOCK_ERROR_MESSAGES[code];
}

// ============================================
// ERROR CLASSES
// ============================================

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Base of the taxonomy. `message` doubles as the user-facing text;
 * `context` carries the structured fields for logs and result objects.
 */
export class StockError extends Error {
  readonly code: StockErrorCode;
  readonly statusCode: number;
  readonly userMessage: string;
  readonly context: Record<string, unknown>;

  constructor(
    code: StockErrorCode,
    options?: {
      message?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const userMessage = options?.message || getStockErrorMessage(code);
    super(userMessage);
    this.name = 'StockError';
    this.code = code;
    this.statusCode = STOCK_ERROR_HTTP_STATUS[code];
    this.userMessage = userMessage;
    this.context = options?.context ?? {};
    Object.setPrototypeOf(this, StockError.prototype);
  }

  /**
   * Convert to result object for callers that prefer values over exceptions
   */
  toResult(): StockErrorResult {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.userMessage,
        context: this.context,
      },
    };
  }
}

/**
 * Malformed input: bad quantity, discount out of range, unknown type, bad date.
 *
 * @example
 * throw new ValidationError('Quantity must be greater than 0', [{ path: 'quantity', message: 'Too small' }]);
 */
export class ValidationError extends StockError {
  readonly name = 'ValidationError' as const;
  readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super(STOCK_ERROR_CODES.VALIDATION, { message, context: { details } });
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends StockError {
  readonly name = 'NotFoundError' as const;
  readonly resourceType: string;
  readonly resourceId: string | number;

  constructor(resourceType: string, resourceId: string | number) {
    super(STOCK_ERROR_CODES.NOT_FOUND, {
      message: `${resourceType} ${resourceId} not found`,
      context: { resourceType, resourceId },
    });
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InsufficientStockError extends StockError {
  readonly name = 'InsufficientStockError' as const;
  readonly productId: number;
  readonly available: number;
  readonly requested: number;

  constructor(productId: number, available: number, requested: number) {
    super(STOCK_ERROR_CODES.INSUFFICIENT_STOCK, {
      message: `Insufficient stock: available ${available}, requested ${requested}`,
      context: { productId, available, requested },
    });
    this.productId = productId;
    this.available = available;
    this.requested = requested;
    Object.setPrototypeOf(this, InsufficientStockError.prototype);
  }
}

export class AlreadyReplacedError extends StockError {
  readonly name = 'AlreadyReplacedError' as const;
  readonly damageId: number;

  constructor(damageId: number) {
    super(STOCK_ERROR_CODES.ALREADY_REPLACED, { context: { damageId } });
    this.damageId = damageId;
    Object.setPrototypeOf(this, AlreadyReplacedError.prototype);
  }
}

export type SaleMismatchField = 'product' | 'quantity' | 'discount';

export class SaleMismatchError extends StockError {
  readonly name = 'SaleMismatchError' as const;
  readonly saleId: number;
  readonly mismatches: SaleMismatchField[];

  constructor(saleId: number, mismatches: SaleMismatchField[]) {
    super(STOCK_ERROR_CODES.SALE_MISMATCH, {
      message: `Selected sale does not match ${mismatches.join(', ')}`,
      context: { saleId, mismatches },
    });
    this.saleId = saleId;
    this.mismatches = mismatches;
    Object.setPrototypeOf(this, SaleMismatchError.prototype);
  }
}

/**
 * Duplicate unique value, or a delete blocked by references.
 *
 * @example
 * throw new ConflictError(STOCK_ERROR_CODES.DUPLICATE, 'Product "Mouse" already exists', { name: 'Mouse' });
 */
export class ConflictError extends StockError {
  readonly name = 'ConflictError' as const;

  constructor(
    code: typeof STOCK_ERROR_CODES.DUPLICATE | typeof STOCK_ERROR_CODES.PRODUCT_IN_USE,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, { message, context });
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * The store rejected or timed out on an operation. Never retried by the engine.
 */
export class StorageError extends StockError {
  readonly name = 'StorageError' as const;
  readonly operation: string;
  readonly originalError: Error | null;

  constructor(operation: string, originalError: unknown = null) {
    const original = originalError instanceof Error ? originalError : null;
    super(STOCK_ERROR_CODES.STORAGE, {
      context: { operation, cause: original?.message ?? (originalError === null ? null : String(originalError)) },
    });
    this.operation = operation;
    this.originalError = original;
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

/**
 * Build a ValidationError from a failed Zod parse.
 * The first issue becomes the message; all issues go into `details`.
 */
export function validationErrorFromZod(error: ZodError): ValidationError {
  const details = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new ValidationError(details[0]?.message || 'Validation failed', details);
}

// ============================================
// RESULT TYPES
// ============================================

export interface StockErrorResult {
  success: false;
  error: {
    code: StockErrorCode;
    message: string;
    context?: Record<string, unknown>;
  };
}

export interface StockSuccessResult<T> {
  success: true;
  data: T;
  message?: string;
}

export type StockResult<T> = StockSuccessResult<T> | StockErrorResult;

// ============================================
// RESULT HELPERS
// ============================================

export function stockSuccess<T>(data: T, message?: string): StockSuccessResult<T> {
  return message === undefined ? { success: true, data } : { success: true, data, message };
}
