import { describe, it, expect } from 'vitest';
import { validateBatch } from '../../services/ranking/quoteBatch';
import { RUN_DATE, makeQuote } from './helpers';

describe('validateBatch', () => {
    it('keeps the first row for a name and reports the rest', () => {
        const { records, rejected } = validateBatch(
            [
                makeQuote({ commodityName: 'Gold', price: 2650 }),
                makeQuote({ commodityName: 'Gold', price: 1 }),
                makeQuote({ commodityName: 'Silver', quoteDate: '2025-11-27' }),
                makeQuote({ commodityName: 'Copper', price: Number.NaN }),
                makeQuote({ commodityName: '   ' }),
                makeQuote({ commodityName: 'Zinc', pctWeekly: Number.POSITIVE_INFINITY })
            ],
            RUN_DATE
        );

        expect(records.map(r => [r.commodityName, r.price])).toEqual([['Gold', 2650]]);
        expect(rejected).toEqual([
            { rowIndex: 1, commodityName: 'Gold', reason: 'duplicate commodity name in batch' },
            { rowIndex: 2, commodityName: 'Silver', reason: 'quote date 2025-11-27 does not match run date 2025-11-28' },
            { rowIndex: 3, commodityName: 'Copper', reason: 'missing price' },
            { rowIndex: 4, commodityName: null, reason: 'missing commodity name' },
            { rowIndex: 5, commodityName: 'Zinc', reason: 'invalid pctWeekly' }
        ]);
    });

    it('logs one warning per skipped row', () => {
        validateBatch([makeQuote({ commodityName: '' })], RUN_DATE);
        expect(console.warn).toHaveBeenCalledWith('[Batch] Skipping row 0 (unnamed): missing commodity name');
    });
});
