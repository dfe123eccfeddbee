import 'dotenv/config';
import { readFile } from 'node:fs/promises';

import { loadAppConfig } from '../config/env';
import type { AppConfig } from '../config/env';
import { loadSubscriptions } from '../config/subscriptions';
import { ANALYSIS } from '../config/analysisConfig';
import { fetchCommoditiesPage } from '../services/api/commoditiesPage';
import { runDailyAnalysis } from '../services/dailyAnalysis';
import { EmailChannel, SmsChannel } from '../services/notifications/emailChannel';
import { createSmtpTransport } from '../services/notifications/smtp';
import type { ChannelRegistry } from '../services/notifications/types';
import { WebhookChannel } from '../services/notifications/webhookChannel';
import { filterByName, topPerformers } from '../services/ranking/rankingEngine';
import { rankingChanges } from '../services/ranking/strongLeads';
import { flattenBuckets } from '../services/ranking/investmentClassifier';
import {
    opportunitiesTable,
    quotesTable,
    rankingChangesTable,
    rankingTable,
    strongLeadsTable
} from '../services/reporting/tables';
import { parseCommodityTable } from '../services/scraper/tableParser';
import { MemorySnapshotStore } from '../services/storage/memoryStore';
import { MySqlSnapshotStore } from '../services/storage/mysqlStore';
import { prepareStore } from '../services/storage/prepareStore';
import type { SnapshotStore } from '../services/storage/types';
import { getArg, getDateArg, hasFlag } from './lib/args';

// Usage: npm run daily -- [--date=YYYY-MM-DD] [--html=saved-page.html] [--filter=keyword] [--dry-run] [--no-alerts]

const buildChannels = (config: AppConfig): ChannelRegistry => {
    const channels: ChannelRegistry = { webhook: new WebhookChannel() };
    if (config.smtp) {
        const transport = createSmtpTransport(config.smtp);
        channels.email = new EmailChannel(transport, config.smtp.from);
        channels.sms = new SmsChannel(transport, config.smtp.from);
    }
    return channels;
};

const openStore = async (config: AppConfig, dryRun: boolean): Promise<SnapshotStore> => {
    if (dryRun) {
        console.log('🧪 Dry run: reports are kept in memory only');
        return new MemorySnapshotStore();
    }
    return prepareStore(MySqlSnapshotStore.connect(config.db));
};

const run = async () => {
    const argv = process.argv.slice(2);
    const date = getDateArg(argv);
    const htmlFile = getArg(argv, 'html');
    const dryRun = hasFlag(argv, 'dry-run');
    const keyword = getArg(argv, 'filter');
    const config = loadAppConfig();
    const notificationsEnabled = config.notificationsEnabled && !hasFlag(argv, 'no-alerts');

    console.log(`\n🚀 Daily commodity analysis for ${date}`);

    const html = htmlFile ? await readFile(htmlFile, 'utf8') : await fetchCommoditiesPage(config.sourceUrl);
    const parsed = parseCommodityTable(html, date);
    console.log(`📥 ${parsed.records.length} quotes parsed, ${parsed.rejected.length} rows skipped`);

    const subscriptions = notificationsEnabled ? await loadSubscriptions() : [];
    const store = await openStore(config, dryRun);

    try {
        const result = await runDailyAnalysis(date, parsed.records, {
            store,
            settings: config.settings,
            notificationsEnabled,
            subscriptions,
            channels: buildChannels(config)
        });

        for (const timeframe of ['Daily', 'Weekly'] as const) {
            const top = result.rankings[timeframe].filter(e => e.rank <= config.settings.topN);
            console.log(`\n📈 TOP ${config.settings.topN} BY CATEGORY (${timeframe})`);
            console.log(rankingTable(timeframe, top));
        }

        const leaders = topPerformers(result.records, 'Daily', ANALYSIS.RANKING.TOP_PERFORMERS);
        console.log(`\n🏆 TOP ${leaders.length} DAILY PERFORMERS (all categories)`);
        console.log(rankingTable('Daily', leaders));

        console.log(`\n⭐ STRONG LEADS (${result.strongLeads.length})`);
        console.log(result.strongLeads.length > 0 ? strongLeadsTable(result.strongLeads) : 'No strong leads today.');

        console.log('\n💡 INVESTMENT OPPORTUNITIES');
        const opportunities = flattenBuckets(result.opportunities);
        console.log(opportunities.length > 0 ? opportunitiesTable(opportunities) : 'No confirmed momentum today.');

        const movers = rankingChanges(result.strongLeads, { limit: ANALYSIS.STRONG_LEADS.CHANGES_LIMIT });
        console.log(`\n🔀 RANKING CHANGES vs ${result.previousSnapshotDate ?? 'no previous snapshot'}`);
        console.log(movers.length > 0 ? rankingChangesTable(movers) : 'Nothing to compare.');

        if (keyword) {
            const matches = filterByName(result.records, keyword);
            console.log(`\n🔍 ${matches.length} QUOTES MATCHING "${keyword}"`);
            if (matches.length > 0) console.log(quotesTable(matches));
        }

        if (result.alerts) {
            console.log(`\n🔔 Alerts: ${result.alerts.sent} sent, ${result.alerts.failed} failed of ${result.alerts.matched}`);
        }

        if (result.failures.length > 0) {
            console.error(`\n❌ ${result.failures.length} report(s) failed:`);
            for (const failure of result.failures) console.error(`   [${failure.code}] ${failure.message}`);
            process.exitCode = 1;
        } else {
            console.log(`\n✅ DAILY RUN COMPLETE for ${date}`);
        }
    } finally {
        await store.close();
    }
};

run().catch((error: unknown) => {
    console.error('❌ Daily run failed:', error);
    process.exitCode = 1;
});
