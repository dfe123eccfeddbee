/**
 * Commodity table parser
 *
 * The quote page is a run of tables, one per category. A header row (`th`) names the
 * category; every row with at least eight `td` cells under it is a quote:
 *
 *   name+unit | price | change | day % | week % | month % | year % | 3y % | [date]
 *
 * Rows that cannot be read are reported back instead of aborting the parse.
 */

import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';

import type { AssetCategory, MalformedRecord, QuoteRecord } from '../../types';
import { resolveUpdateLabel } from '../utils/dates';

export interface ParsedTable {
    records: QuoteRecord[];
    rejected: MalformedRecord[];
}

const MIN_CELLS = 8;

// Column captions that share the header row with the category name
const COLUMN_LABELS = new Set(['price', 'day', '%', 'week', 'month', 'year', '3y', 'yoy', 'date']);

const CATEGORY_ALIASES: Record<string, AssetCategory> = {
    energy: 'Energy',
    electricity: 'Energy',
    metals: 'Metals',
    metal: 'Metals',
    agriculture: 'Agriculture',
    agricultural: 'Agriculture',
    livestock: 'Livestock',
    industrial: 'Industrial',
    industrials: 'Industrial',
    index: 'Industrial',
};

export const resolveCategory = (header: string): AssetCategory | null =>
    CATEGORY_ALIASES[header.trim().toLowerCase()] ?? null;

class CellError extends Error {}

function parseNumber(text: string, column: string): number {
    const cleaned = text.replace(/[,\s]/g, '');
    const value = cleaned ? Number(cleaned) : NaN;
    if (!Number.isFinite(value)) throw new CellError(`invalid ${column} "${text}"`);
    return value;
}

/** Blank and dash cells mean "not published" and stay null. */
function parsePercent(text: string, column: string): number | null {
    const cleaned = text.replace(/[%,\s]/g, '');
    if (cleaned === '' || cleaned === '-' || cleaned === '—') return null;
    const value = Number(cleaned);
    if (!Number.isFinite(value)) throw new CellError(`invalid ${column} "${text}"`);
    return value;
}

function textNodes(node: AnyNode): string[] {
    if (isText(node)) return [node.data];
    return hasChildren(node) ? node.children.flatMap(textNodes) : [];
}

/**
 * Name and unit usually sit in separate elements ("Crude Oil" / "USD/Bbl").
 * A single run of text is split on its last space.
 */
export function splitNameUnit(cell: Cheerio<Element>): { name: string; unit: string } {
    const parts = cell
        .toArray()
        .flatMap(textNodes)
        .map(text => text.trim())
        .filter(text => text.length > 0);

    if (parts.length >= 2) return { name: parts[0], unit: parts[1] };
    if (parts.length === 0) return { name: cell.text().trim(), unit: '' };

    const text = parts[0];
    const cut = text.lastIndexOf(' ');
    return cut === -1 ? { name: text, unit: '' } : { name: text.slice(0, cut), unit: text.slice(cut + 1) };
}

export function parseCommodityTable(html: string, quoteDate: string): ParsedTable {
    const $ = cheerio.load(html);
    const records: QuoteRecord[] = [];
    const rejected: MalformedRecord[] = [];
    const seen = new Set<string>();

    let header: string | null = null;
    let category: AssetCategory | null = null;
    let rowIndex = -1;

    $('tr').each((_, row) => {
        const th = $(row).find('th').first();
        if (th.length > 0) {
            const text = th.text().trim();
            if (text && !COLUMN_LABELS.has(text.toLowerCase())) {
                header = text;
                category = resolveCategory(text);
                if (!category) console.warn(`[Parser] Unknown category header "${text}"`);
            }
            return;
        }

        const cells = $(row).find('td');
        if (cells.length < MIN_CELLS) return;
        rowIndex += 1;

        const texts = cells.map((_, td) => $(td).text().trim()).get();
        const { name, unit } = splitNameUnit(cells.first());
        const commodityName = name || null;

        const reject = (reason: string): void => {
            rejected.push({ rowIndex, commodityName, reason });
        };

        if (!commodityName) return reject('missing commodity name');
        if (!category) {
            return reject(header ? `unknown category "${header}"` : 'missing category');
        }
        if (seen.has(commodityName)) return reject('duplicate commodity name in batch');

        try {
            records.push({
                assetCategory: category,
                commodityName,
                unit,
                price: parseNumber(texts[1], 'price'),
                changeAbsolute: parseNumber(texts[2], 'change'),
                pctDaily: parsePercent(texts[3], 'daily %'),
                pctWeekly: parsePercent(texts[4], 'weekly %'),
                pctMonthly: parsePercent(texts[5], 'monthly %'),
                pctYearly: parsePercent(texts[6], 'yearly %'),
                pct3Year: parsePercent(texts[7], '3-year %'),
                quoteDate,
                sourceUpdate: resolveUpdateLabel(texts[8] ?? '', quoteDate),
            });
            seen.add(commodityName);
        } catch (error) {
            if (!(error instanceof CellError)) throw error;
            reject(error.message);
        }
    });

    for (const r of rejected) {
        console.warn(`[Parser] Skipping row ${r.rowIndex} (${r.commodityName ?? 'unnamed'}): ${r.reason}`);
    }
    console.log(`[Parser] Parsed ${records.length} quotes, skipped ${rejected.length}`);

    return { records, rejected };
}
