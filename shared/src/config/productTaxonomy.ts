/**
 * Product Taxonomy
 *
 * Single source of truth for product types and the groups they belong to.
 * Types are stored on the product row as plain strings; groups are derived.
 *
 * TO ADD A NEW TYPE:
 *   Add it to the relevant group in productTaxonomy.json.
 *   No migration needed.
 */

import { z } from 'zod';
import rawTaxonomy from './productTaxonomy.json' with { type: 'json' };

// ============================================
// GROUPS
// ============================================

const taxonomySchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

/** Group name → leaf product types, in display order */
export const PRODUCT_TAXONOMY: Readonly<Record<string, readonly string[]>> = taxonomySchema.parse(rawTaxonomy);

/** Every known leaf type, de-duplicated (a type may sit in more than one group) */
export const PRODUCT_TYPES: readonly string[] = [...new Set(Object.values(PRODUCT_TAXONOMY).flat())];

/** Category values that disable category filtering */
export const ALL_CATEGORIES_SENTINELS: readonly string[] = ['All', 'All Types'];

// ============================================
// HELPERS
// ============================================

const typeSet = new Set(PRODUCT_TYPES);

export function isKnownProductType(type: string): boolean {
  return typeSet.has(type);
}

/**
 * True when `type` equals `category`, or `category` names a group containing `type`.
 */
export function typeMatchesCategory(type: string, category: string): boolean {
  if (type === category) return true;
  const members = PRODUCT_TAXONOMY[category];
  return members !== undefined && members.includes(type);
}
