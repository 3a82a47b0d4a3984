/**
 * Shared TypeScript types for the stock ledger
 *
 * Entity shapes as returned by the engine and the HTTP surface.
 * Database row shapes live in database/types.ts.
 */

// ============================================
// PRODUCTS & LEDGER
// ============================================

export interface Product {
  id: number;
  name: string;
  /** Leaf type from the product taxonomy */
  type: string;
  buyPrice: number;
  sellPrice: number;
  /** Cached projection of the ledger sum; never negative */
  stock: number;
  lastUpdated: string;
  createdAt: string;
}

export interface LedgerEntry {
  id: number;
  productId: number;
  delta: number;
  reason: string;
  createdAt: string;
}

export interface ProductNameOption {
  id: number;
  name: string;
}

// ============================================
// SALES & DAMAGES
// ============================================

export interface SaleRecord {
  id: number;
  date: string;
  productId: number;
  /** Product name at the time the sale was written */
  itemName: string;
  quantity: number;
  unitPrice: number;
  discount: number;
  total: number;
  createdAt: string;
}

export interface DamageRecord {
  id: number;
  date: string;
  productId: number;
  productName: string;
  quantity: number;
  replaced: boolean;
  createdAt: string;
}

export interface DamageListing {
  damages: DamageRecord[];
  unreplacedUnits: number;
}

// ============================================
// INVOICES
// ============================================

export interface InvoiceItem {
  id: number;
  invoiceId: number;
  productId: number;
  productName: string;
  quantity: number;
  unitPrice: number;
  discount: number;
  total: number;
}

export interface Invoice {
  id: number;
  invoiceNumber: string;
  date: string;
  customerName: string;
  subtotal: number;
  tax: number;
  grandTotal: number;
  /** Set when the invoice documents an earlier sale; such invoices never touch stock */
  saleId: number | null;
  createdAt: string;
}

export interface InvoiceWithItem extends Invoice {
  item: InvoiceItem;
}

// ============================================
// ENGINE OUTPUTS
// ============================================

export interface LowStockEvent {
  productId: number;
  name: string;
  quantity: number;
}

export interface DriftCorrection {
  productId: number;
  productName: string;
  /** Ledger sum before the correction */
  oldQty: number;
  /** Cached stock, which the ledger now sums to */
  newQty: number;
  delta: number;
}

export interface StockLevel {
  id: number;
  name: string;
  stock: number;
}

export interface SoldItem {
  productId: number;
  name: string;
  quantity: number;
}

export interface StockSummary {
  totalProducts: number;
  totalStock: number;
  lowStockThreshold: number;
  lowStock: StockLevel[];
  unreplacedDamagedUnits: number;
  totalSales: number;
  totalSalesQuantity: number;
  /** Mean sale total; 0 when nothing has been sold */
  averageSale: number;
  /** Five best sellers by units sold */
  topSoldItems: SoldItem[];
  /** Five products with the most units on hand */
  topStockedItems: StockLevel[];
}

export interface ImportSummary {
  created: number;
  updated: number;
  unitsAdded: number;
}
