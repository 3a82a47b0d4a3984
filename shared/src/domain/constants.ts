/**
 * Domain Constants
 *
 * Business constants shared by the engine, the HTTP surface and the CLI.
 */

export const STOCK_CONFIG = {
  /** Quantity at or below which a low-stock event fires */
  lowStockThreshold: 5,
  /** Invoice VAT as a fraction of the subtotal */
  vatRate: 0.13,
  /** Quiet period before re-evaluating product filters */
  filterDebounceMs: 300,
  /** Length of the best-seller and most-stocked lists in the summary */
  summaryTopCount: 5,
} as const;

/**
 * Ledger reason tags written by the engine.
 * Manual `mutateStock` calls carry a caller-supplied reason instead.
 */
export const LEDGER_REASONS = {
  initialStock: 'Initial stock',
  stockUpdated: 'Stock updated',
  imported: 'Imported stock',
  reconciliation: 'Stock reconciliation',
  sale: (quantity: number, discount: number) => `Sale of ${quantity} units with ${discount}% discount`,
  saleEdit: (oldQuantity: number, newQuantity: number) => `Sale edit (old: ${oldQuantity}, new: ${newQuantity})`,
  saleDeletion: (quantity: number) => `Sale deletion (${quantity} sold)`,
  damage: (quantity: number) => `Damaged ${quantity} units`,
  damageReplaced: (quantity: number) => `Replaced ${quantity} damaged units`,
  damageDeleted: (quantity: number) => `Deleted damage entry (${quantity} units)`,
  invoice: (invoiceNumber: string) => `Invoice ${invoiceNumber}`,
  invoiceDeletion: (invoiceNumber: string) => `Invoice ${invoiceNumber} deletion`,
} as const;
