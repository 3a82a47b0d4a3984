/**
 * Product Import
 *
 * Bulk stock intake from an exported product list. The whole batch is one
 * unit of work: if any row fails, no row is applied.
 *
 * Rows naming an existing product update its type and prices and credit the
 * quantity; unknown names create the product first.
 */

import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import {
    ImportBatchSchema,
    ImportRowSchema,
    LEDGER_REASONS,
    ValidationError,
    nowIso,
    validationErrorFromZod,
} from '@stockledger/shared';
import type { ImportBatchInput, ImportRow, ImportSummary, ValidationIssue } from '@stockledger/shared';
import { importExportLogger } from '../../utils/logger.js';
import type { StockMutationService } from '../inventory/stockMutationService.js';
import type { UnitOfWork } from '../inventory/unitOfWork.js';

/**
 * Validate every row up front so a bad file is rejected before any write.
 * Issue paths carry the 1-based row number, e.g. "row 3.buyPrice".
 */
export function validateImportRows(input: ImportBatchInput): ImportRow[] {
    const batch = ImportBatchSchema.safeParse(input);
    if (!batch.success) throw validationErrorFromZod(batch.error);

    const rows: ImportRow[] = [];
    const issues: ValidationIssue[] = [];

    batch.data.rows.forEach((raw, index) => {
        const parsed = ImportRowSchema.safeParse(raw);
        if (parsed.success) {
            rows.push(parsed.data);
            return;
        }
        for (const issue of parsed.error.issues) {
            const field = issue.path.join('.');
            issues.push({
                path: field ? `row ${index + 1}.${field}` : `row ${index + 1}`,
                message: issue.message,
            });
        }
    });

    if (issues.length > 0) {
        const first = issues[0];
        throw new ValidationError(first ? `Import rejected at ${first.path}: ${first.message}` : 'Import rejected', issues);
    }
    return rows;
}

export class ProductImportService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly mutations: StockMutationService,
    ) {}

    async importProducts(input: ImportBatchInput): Promise<ImportSummary> {
        const rows = validateImportRows(input);

        const summary = await this.unitOfWork.run('importProducts', async (ctx) => {
            const result: ImportSummary = { created: 0, updated: 0, unitsAdded: 0 };

            for (const row of rows) {
                const productId = await this.upsertProduct(ctx.trx, row, result);
                if (row.quantity > 0) {
                    await this.mutations.applyDelta(ctx, productId, row.quantity, LEDGER_REASONS.imported);
                    result.unitsAdded += row.quantity;
                }
            }
            return result;
        });

        importExportLogger.info({ rows: rows.length, ...summary }, 'Product import committed');
        return summary;
    }

    private async upsertProduct(trx: Kysely<DB>, row: ImportRow, result: ImportSummary): Promise<number> {
        const now = nowIso();
        const existing = await trx.selectFrom('product').select('id').where('name', '=', row.name).executeTakeFirst();

        if (existing) {
            await trx
                .updateTable('product')
                .set({ type: row.type, buyPrice: row.buyPrice, sellPrice: row.sellPrice, lastUpdated: now })
                .where('id', '=', existing.id)
                .execute();
            result.updated++;
            return existing.id;
        }

        const created = await trx
            .insertInto('product')
            .values({
                name: row.name,
                type: row.type,
                buyPrice: row.buyPrice,
                sellPrice: row.sellPrice,
                stock: 0,
                lastUpdated: now,
                createdAt: now,
            })
            .returning('id')
            .executeTakeFirstOrThrow();
        result.created++;
        return created.id;
    }
}
