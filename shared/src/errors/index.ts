/**
 * Shared Error Utilities
 *
 * Export barrel for the stock error taxonomy.
 */

export {
  // Error codes
  STOCK_ERROR_CODES,
  type StockErrorCode,
  // Messages & status mapping
  STOCK_ERROR_MESSAGES,
  STOCK_ERROR_HTTP_STATUS,
  // Error classes
  StockError,
  ValidationError,
  NotFoundError,
  InsufficientStockError,
  AlreadyReplacedError,
  SaleMismatchError,
  ConflictError,
  StorageError,
  validationErrorFromZod,
  type ValidationIssue,
  type SaleMismatchField,
  // Result types
  type StockErrorResult,
  type StockSuccessResult,
  type StockResult,
  // Result helpers
  stockSuccess,
} from './stock.js';
