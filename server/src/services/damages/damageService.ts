/**
 * Damage Service
 *
 * Damaged units leave stock when reported and come back when the supplier
 * replaces them. Deleting an unreplaced entry also returns its units.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type { DB, DamageRow } from '@stockledger/shared/database';
import {
    AlreadyReplacedError,
    DamageInputSchema,
    LEDGER_REASONS,
    NotFoundError,
    nowIso,
    validationErrorFromZod,
} from '@stockledger/shared';
import type { DamageInput, DamageListing, DamageRecord } from '@stockledger/shared';
import { damageLogger } from '../../utils/logger.js';
import type { StockMutationService } from '../inventory/stockMutationService.js';
import type { UnitOfWork } from '../inventory/unitOfWork.js';
import { requireProductByName } from '../products/productService.js';

function toDamageRecord(row: DamageRow): DamageRecord {
    return { ...row, replaced: row.replaced === 1 };
}

async function requireDamage(db: Kysely<DB>, id: number): Promise<DamageRecord> {
    const row = await db.selectFrom('damage').selectAll().where('id', '=', id).executeTakeFirst();
    if (!row) throw new NotFoundError('Damage entry', id);
    return toDamageRecord(row);
}

export class DamageService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly mutations: StockMutationService,
    ) {}

    async listDamages(): Promise<DamageListing> {
        return this.unitOfWork.read('listDamages', async (db) => {
            const rows = await db.selectFrom('damage').selectAll().orderBy('date', 'desc').orderBy('id', 'desc').execute();
            const totals = await db
                .selectFrom('damage')
                .select(sql<number>`cast(coalesce(sum(${sql.ref('quantity')}), 0) as integer)`.as('units'))
                .where('replaced', '=', 0)
                .executeTakeFirstOrThrow();

            return { damages: rows.map(toDamageRecord), unreplacedUnits: Number(totals.units) };
        });
    }

    async getDamage(id: number): Promise<DamageRecord> {
        return this.unitOfWork.read('getDamage', (db) => requireDamage(db, id));
    }

    async createDamage(input: DamageInput): Promise<DamageRecord> {
        const parsed = DamageInputSchema.safeParse(input);
        if (!parsed.success) throw validationErrorFromZod(parsed.error);
        const data = parsed.data;

        const damage = await this.unitOfWork.run('createDamage', async (ctx) => {
            const product = await requireProductByName(ctx.trx, data.productName);
            await this.mutations.applyDelta(ctx, product.id, -data.quantity, LEDGER_REASONS.damage(data.quantity));

            const row = await ctx.trx
                .insertInto('damage')
                .values({
                    date: data.date,
                    productId: product.id,
                    productName: product.name,
                    quantity: data.quantity,
                    replaced: 0,
                    createdAt: nowIso(),
                })
                .returningAll()
                .executeTakeFirstOrThrow();
            return toDamageRecord(row);
        });

        damageLogger.info({ damageId: damage.id, productId: damage.productId, quantity: damage.quantity }, 'Damage recorded');
        return damage;
    }

    async replaceDamage(id: number): Promise<DamageRecord> {
        const damage = await this.unitOfWork.run('replaceDamage', async (ctx) => {
            const current = await requireDamage(ctx.trx, id);
            if (current.replaced) throw new AlreadyReplacedError(id);

            await this.mutations.applyDelta(ctx, current.productId, current.quantity, LEDGER_REASONS.damageReplaced(current.quantity));
            await ctx.trx.updateTable('damage').set({ replaced: 1 }).where('id', '=', id).execute();
            return { ...current, replaced: true };
        });

        damageLogger.info({ damageId: id, quantity: damage.quantity }, 'Damage replaced');
        return damage;
    }

    /**
     * Remove a damage entry; its units return to stock only if never replaced.
     */
    async deleteDamage(id: number): Promise<DamageRecord> {
        const damage = await this.unitOfWork.run('deleteDamage', async (ctx) => {
            const current = await requireDamage(ctx.trx, id);
            await ctx.trx.deleteFrom('damage').where('id', '=', id).execute();
            if (!current.replaced) {
                await this.mutations.applyDelta(ctx, current.productId, current.quantity, LEDGER_REASONS.damageDeleted(current.quantity));
            }
            return current;
        });

        damageLogger.info({ damageId: id, restored: !damage.replaced }, 'Damage entry deleted');
        return damage;
    }
}
