/**
 * Centralized Analysis Configuration
 *
 * Defaults for ranking depth, strong-lead detection and momentum classification.
 * Environment overrides are applied in config/env.ts.
 */

export const ANALYSIS = {
    // RANKING
    RANKING: {
        TOP_N: 5,              // per category, per timeframe
        TOP_PERFORMERS: 10     // cross-category leaderboard
    },

    // STRONG LEADS
    STRONG_LEADS: {
        TOP_K: 3,              // must rank within top K of its category...
        MIN_TIMEFRAMES: 2,     // ...in at least this many timeframes
        CHANGES_LIMIT: 10      // movers shown in the ranking-changes report
    },

    // INVESTMENT OPPORTUNITIES
    MOMENTUM: {
        THRESHOLD: 1.0         // % minimum move on the leading horizon
    },

    // ALERTS
    ALERTS: {
        DEFAULT_MIN_PERCENT_CHANGE: 1.0
    }
} as const;

export const SOURCE = {
    URL: 'https://tradingeconomics.com/commodities',
    USER_AGENT: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    TIMEOUT_MS: 10_000
} as const;

export interface AnalysisSettings {
    topN: number;
    strongLeadTopK: number;
    minStrongLeadTimeframes: number;
    momentumThreshold: number;
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
    topN: ANALYSIS.RANKING.TOP_N,
    strongLeadTopK: ANALYSIS.STRONG_LEADS.TOP_K,
    minStrongLeadTimeframes: ANALYSIS.STRONG_LEADS.MIN_TIMEFRAMES,
    momentumThreshold: ANALYSIS.MOMENTUM.THRESHOLD
};
