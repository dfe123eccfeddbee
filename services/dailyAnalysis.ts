/**
 * Daily Analysis Orchestrator
 *
 * Runs one day's quote batch through ranking, strong-lead detection and momentum
 * classification, persists every report for the date and sends price alerts.
 *
 * Each report persists on its own: a failed write is recorded in the result and the
 * remaining reports are still attempted. Alert delivery problems are counted but
 * never fail the run.
 */

import type {
    MalformedRecord,
    OpportunityBuckets,
    QuoteRecord,
    StrongLead,
    Subscription,
    TimeframeRankings
} from '../types';
import { TIMEFRAMES } from '../types';
import { DEFAULT_ANALYSIS_SETTINGS } from '../config/analysisConfig';
import type { AnalysisSettings } from '../config/analysisConfig';
import { rankAll } from './ranking/rankingEngine';
import { detectStrongLeads } from './ranking/strongLeads';
import { classifyOpportunities, flattenBuckets } from './ranking/investmentClassifier';
import { validateBatch } from './ranking/quoteBatch';
import { AlertService, buildAlertEvents } from './notifications/alertService';
import type { AlertDispatchSummary } from './notifications/alertService';
import type { ChannelRegistry } from './notifications/types';
import type { ReportName, SnapshotStore } from './storage/types';
import { AnalysisError, errorMessage } from './utils/errors';
import { assertIsoDate } from './utils/dates';

export interface DailyAnalysisDeps {
    store: SnapshotStore;
    settings?: AnalysisSettings;
    notificationsEnabled?: boolean;
    subscriptions?: readonly Subscription[];
    channels?: ChannelRegistry;
}

export type PersistenceStatus = 'written' | 'failed';

export interface DailyAnalysisResult {
    date: string;
    records: QuoteRecord[];
    rejected: MalformedRecord[];
    rankings: TimeframeRankings;
    strongLeads: StrongLead[];
    opportunities: OpportunityBuckets;
    previousSnapshotDate: string | null;
    persistence: Record<ReportName, PersistenceStatus>;
    failures: AnalysisError[];
    alerts: AlertDispatchSummary | null; // null when notifications are off
}

const asPersistenceFailure = (error: unknown, message: string): AnalysisError =>
    error instanceof AnalysisError
        ? error
        : new AnalysisError('PERSISTENCE_FAILURE', `${message}: ${errorMessage(error)}`, { cause: error });

export async function runDailyAnalysis(
    date: string,
    batch: readonly QuoteRecord[],
    deps: DailyAnalysisDeps
): Promise<DailyAnalysisResult> {
    assertIsoDate(date);
    const { store } = deps;
    const settings = deps.settings ?? DEFAULT_ANALYSIS_SETTINGS;

    const failures: AnalysisError[] = [];
    const persistence: Record<ReportName, PersistenceStatus> = {
        quotes: 'failed',
        rankings: 'failed',
        strongLeads: 'failed',
        investmentOpportunities: 'failed'
    };

    const persist = async (report: ReportName, write: () => Promise<void>): Promise<void> => {
        try {
            await write();
            persistence[report] = 'written';
        } catch (error) {
            const failure = asPersistenceFailure(error, `Failed to save ${report} for ${date}`);
            console.error(`[Daily] ${failure.message}`);
            failures.push(failure);
        }
    };

    console.log(`[Daily] Analysing ${batch.length} quotes for ${date}`);
    const { records, rejected } = validateBatch(batch, date);

    await persist('quotes', () => store.writeQuotes(date, records));

    // 1. Rankings
    const rankings = rankAll(records);
    await persist('rankings', () =>
        store.writeRankings(date, TIMEFRAMES.flatMap(timeframe => rankings[timeframe]))
    );

    // 2. Strong leads against the last snapshot before today
    let strongLeads: StrongLead[] = [];
    let previousSnapshotDate: string | null = null;
    let previous: StrongLead[] | null = null;
    try {
        previousSnapshotDate = await store.findPreviousSnapshotDate('strongLeads', date);
        previous = previousSnapshotDate ? await store.readStrongLeads(previousSnapshotDate) : [];
    } catch (error) {
        // Without a baseline the strong-lead report is not published
        const failure = asPersistenceFailure(error, `Failed to read strong leads before ${date}`);
        console.error(`[Daily] ${failure.message}`);
        failures.push(failure);
    }

    if (previous) {
        if (!previousSnapshotDate) {
            console.log(`[Daily] No strong-lead snapshot before ${date}; ranking changes start fresh`);
        }
        strongLeads = detectStrongLeads(records, previous, {
            quoteDate: date,
            topK: settings.strongLeadTopK,
            minTimeframes: settings.minStrongLeadTimeframes
        });
        const leads = strongLeads;
        await persist('strongLeads', () => store.writeStrongLeads(date, leads));
    }

    // 3. Investment opportunities
    const opportunities = classifyOpportunities(records, {
        quoteDate: date,
        threshold: settings.momentumThreshold
    });
    await persist('investmentOpportunities', () =>
        store.writeInvestmentOpportunities(date, flattenBuckets(opportunities))
    );

    // 4. Alerts
    let alerts: AlertDispatchSummary | null = null;
    if (deps.notificationsEnabled) {
        const events = buildAlertEvents(records, deps.subscriptions ?? []);
        alerts = await new AlertService(deps.channels ?? {}).dispatch(events);
        if (alerts.failed > 0) {
            console.warn(`[Daily] NOTIFICATION_FAILURE: ${alerts.failed} alert(s) could not be delivered`);
        }
    }

    console.log(`[Daily] Done for ${date}: ${strongLeads.length} strong leads, ${failures.length} failure(s)`);

    return {
        date,
        records,
        rejected,
        rankings,
        strongLeads,
        opportunities,
        previousSnapshotDate,
        persistence,
        failures,
        alerts
    };
}
