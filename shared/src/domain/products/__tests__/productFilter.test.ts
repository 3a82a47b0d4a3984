/**
 * Unit tests for the product filter predicate
 */

import {
    applyProductFilters,
    compileProductFilter,
    evaluateProductFilter,
    isEmptyFilter,
} from '../productFilter.js';
import type { ProductForFilter } from '../productFilter.js';

const cable: ProductForFilter = {
    name: 'Type C Cable Pro',
    type: 'Type C',
    buyPrice: 2,
    sellPrice: 5,
    stock: 10,
    lastUpdated: '2024-03-01T10:00:00.000Z',
};
const mouse: ProductForFilter = {
    name: 'Wireless Mouse',
    type: 'Mouse',
    buyPrice: 8,
    sellPrice: 15,
    stock: 3,
    lastUpdated: '2024-02-10T09:00:00.000Z',
};
const charger: ProductForFilter = {
    name: 'GaN Charger 65W',
    type: 'GaN Charger',
    buyPrice: 20,
    sellPrice: 35,
    stock: 0,
    lastUpdated: '2024-03-05T12:00:00.000Z',
};
const speaker: ProductForFilter = {
    name: 'Bluetooth Speaker Mini',
    type: 'Bluetooth Speaker',
    buyPrice: 12,
    sellPrice: 25,
    stock: 7,
    lastUpdated: '2024-01-20T08:00:00.000Z',
};

const products = [cable, mouse, charger, speaker];

describe('applyProductFilters', () => {
    it('returns every product, as a new array, when no criterion is set', () => {
        const result = applyProductFilters(products, {});
        expect(result).toEqual(products);
        expect(result).not.toBe(products);
    });

    describe('name', () => {
        it('matches a case-insensitive substring', () => {
            expect(applyProductFilters(products, { name: 'MOUSE' })).toEqual([mouse]);
        });

        it('matches a case-insensitive regular expression', () => {
            expect(applyProductFilters(products, { name: '^gan' })).toEqual([charger]);
        });

        it('falls back to substring matching when the pattern is invalid', () => {
            expect(() => applyProductFilters(products, { name: '(' })).not.toThrow();
            expect(applyProductFilters(products, { name: '(' })).toEqual([]);
        });

        it('ignores a blank name', () => {
            expect(applyProductFilters(products, { name: '   ' })).toEqual(products);
        });
    });

    describe('category', () => {
        it('matches a group name through its member types', () => {
            // "Type C" sits in both Chargers and Cables & Connectors
            expect(applyProductFilters(products, { category: 'Chargers' })).toEqual([cable, charger]);
            expect(applyProductFilters(products, { category: 'Cables & Connectors' })).toEqual([cable]);
        });

        it('matches a leaf type exactly', () => {
            expect(applyProductFilters(products, { category: 'Mouse' })).toEqual([mouse]);
        });

        it.each(['All', 'All Types'])('treats "%s" as no category filter', (category) => {
            expect(applyProductFilters(products, { category })).toEqual(products);
        });
    });

    describe('ranges', () => {
        it('applies an upper stock bound inclusively', () => {
            expect(applyProductFilters(products, { stockMax: 5 })).toEqual([mouse, charger]);
        });

        it('applies both stock bounds inclusively', () => {
            expect(applyProductFilters(products, { stockMin: 3, stockMax: 7 })).toEqual([mouse, speaker]);
        });

        it('filters on sell price', () => {
            expect(applyProductFilters(products, { sellPriceMin: 15, sellPriceMax: 25 })).toEqual([mouse, speaker]);
        });

        it('filters on buy price', () => {
            expect(applyProductFilters(products, { buyPriceMin: 10 })).toEqual([charger, speaker]);
        });

        it('ignores NaN bounds', () => {
            expect(applyProductFilters(products, { stockMin: Number.NaN })).toEqual(products);
        });
    });

    describe('updated after', () => {
        it('keeps products updated on or after the given date', () => {
            expect(applyProductFilters(products, { updatedAfter: '2024-02-20' })).toEqual([cable, charger]);
        });

        it('reads a bare date as local midnight', () => {
            const justAfter = { ...mouse, lastUpdated: new Date(2024, 2, 10, 0, 30).toISOString() };
            const justBefore = { ...speaker, lastUpdated: new Date(2024, 2, 9, 23, 59).toISOString() };

            expect(applyProductFilters([justAfter, justBefore], { updatedAfter: '2024-03-10' })).toEqual([justAfter]);
        });

        it('takes an ISO timestamp as an inclusive bound', () => {
            expect(applyProductFilters(products, { updatedAfter: '2024-03-05T12:00:00.000Z' })).toEqual([charger]);
        });

        it.each(['yesterday', '10/03/2024', '2024-02-30'])('ignores the unparseable date %s', (updatedAfter) => {
            expect(compileProductFilter({ updatedAfter }).updatedAfter).toBeNull();
            expect(applyProductFilters(products, { updatedAfter })).toEqual(products);
        });
    });

    it('combines criteria with AND', () => {
        expect(applyProductFilters(products, { category: 'Chargers', stockMax: 5 })).toEqual([charger]);
    });
});

describe('compileProductFilter', () => {
    it('compiles blank criteria to an empty filter', () => {
        expect(isEmptyFilter(compileProductFilter({ name: ' ', category: 'All' }))).toBe(true);
    });

    it('lower-cases the name needle and drops surrounding whitespace', () => {
        const filter = compileProductFilter({ name: '  Cable ' });
        expect(filter.needle).toBe('cable');
        expect(filter.pattern?.flags).toBe('i');
    });
});

describe('evaluateProductFilter', () => {
    it('evaluates raw criteria against a single product', () => {
        expect(evaluateProductFilter(mouse, { name: 'wire', category: 'Peripherals' })).toBe(true);
        expect(evaluateProductFilter(mouse, { name: 'wire', category: 'Chargers' })).toBe(false);
    });
});
