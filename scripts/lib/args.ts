import { assertIsoDate, todayIsoDate } from '../../services/utils/dates';

export function getArg(argv: string[], name: string): string | undefined {
    const prefix = `--${name}=`;
    for (let i = 0; i < argv.length; i += 1) {
        const a = argv[i];

        if (a === `--${name}`) {
            const next = argv[i + 1];
            if (typeof next !== 'string' || next.startsWith('--')) {
                throw new Error(`Expected value after --${name}`);
            }
            return next;
        }

        if (a.startsWith(prefix)) {
            return a.slice(prefix.length);
        }
    }
    return undefined;
}

export const hasFlag = (argv: string[], name: string): boolean => argv.includes(`--${name}`);

export function getDateArg(argv: string[], now: Date = new Date()): string {
    const date = assertIsoDate(getArg(argv, 'date') ?? todayIsoDate(now));

    const today = todayIsoDate(now);
    if (date > today) {
        throw new Error(`Date cannot be in the future. Got ${date}, today is ${today}`);
    }
    return date;
}

export function getIntArg(argv: string[], name: string, fallback: number): number {
    const raw = getArg(argv, name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`--${name} must be a positive integer, got ${raw}`);
    }
    return value;
}
