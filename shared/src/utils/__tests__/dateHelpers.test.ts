import { nowIso, parseDateBound, toCompactTimestamp, toDateOnly } from '../dateHelpers.js';

describe('dateHelpers', () => {
    it('formats an instant as ISO-8601', () => {
        expect(nowIso(new Date('2024-03-09T14:05:07.000Z'))).toBe('2024-03-09T14:05:07.000Z');
    });

    it('formats a local calendar date with zero padding', () => {
        expect(toDateOnly(new Date(2024, 0, 5))).toBe('2024-01-05');
    });

    it('formats a compact local timestamp', () => {
        expect(toCompactTimestamp(new Date(2024, 2, 9, 14, 5, 7))).toBe('2024-03-09-140507');
    });

    describe('parseDateBound', () => {
        it('reads a bare date as local midnight', () => {
            expect(parseDateBound('2024-03-10')).toEqual(new Date(2024, 2, 10));
        });

        it('reads an ISO timestamp as written', () => {
            expect(parseDateBound('2024-03-10T06:15:00.000Z')?.toISOString()).toBe('2024-03-10T06:15:00.000Z');
        });

        it.each(['yesterday', '10/03/2024', '2024-02-30', '2024-13-01', ''])('rejects %j', (value) => {
            expect(parseDateBound(value)).toBeNull();
        });
    });
});
