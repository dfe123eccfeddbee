const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** Width of the stored update label; longer unresolved labels are dropped. */
export const UPDATE_LABEL_MAX_LENGTH = 20;

const pad2 = (n: number) => String(n).padStart(2, '0');

export const formatIsoDate = (year: number, month: number, day: number): string =>
    `${year}-${pad2(month)}-${pad2(day)}`;

/** True for a real calendar day written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
    if (!match) return false;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const parsed = new Date(Date.UTC(year, month - 1, day));
    return parsed.getUTCFullYear() === year
        && parsed.getUTCMonth() === month - 1
        && parsed.getUTCDate() === day;
}

export function assertIsoDate(value: string): string {
    if (!isIsoDate(value)) {
        throw new Error(`Invalid date: ${value}. Expected a real calendar day (YYYY-MM-DD).`);
    }
    return value;
}

/** Local calendar date of `now`. */
export const todayIsoDate = (now: Date = new Date()): string =>
    formatIsoDate(now.getFullYear(), now.getMonth() + 1, now.getDate());

/**
 * Resolves the page's "last update" label against the run date.
 *
 * "Nov/28" becomes a full date in the run year, or the previous year when the month
 * lies after the run month (a December quote read in January). Intraday labels such
 * as "14:05" mean the quote updated on the run date itself. Other labels are kept
 * as written when they fit the stored column, and dropped otherwise.
 */
export function resolveUpdateLabel(label: string, quoteDate: string): string | null {
    const text = label.trim();
    if (!text) return null;
    const verbatim = text.length <= UPDATE_LABEL_MAX_LENGTH ? text : null;

    const [runYear, runMonth] = quoteDate.split('-').map(Number);

    if (/^\d{1,2}:\d{2}(:\d{2})?$/.test(text)) {
        return quoteDate;
    }

    const match = /^([A-Za-z]{3})\/(\d{1,2})$/.exec(text);
    if (!match) return verbatim;

    const monthIndex = MONTHS.findIndex(m => m.toLowerCase() === match[1].toLowerCase());
    if (monthIndex === -1) return verbatim;

    const month = monthIndex + 1;
    const year = month > runMonth ? runYear - 1 : runYear;
    const resolved = formatIsoDate(year, month, Number(match[2]));
    return isIsoDate(resolved) ? resolved : verbatim;
}
