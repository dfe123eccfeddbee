import 'dotenv/config';

import { loadAppConfig } from '../config/env';
import { ANALYSIS } from '../config/analysisConfig';
import { rankingChanges } from '../services/ranking/strongLeads';
import { rankingChangesTable } from '../services/reporting/tables';
import { MySqlSnapshotStore } from '../services/storage/mysqlStore';
import { getDateArg, getIntArg, hasFlag } from './lib/args';

// Usage: npm run changes -- [--date=YYYY-MM-DD] [--limit=10] [--all]

const run = async () => {
    const argv = process.argv.slice(2);
    const date = getDateArg(argv);
    const limit = getIntArg(argv, 'limit', ANALYSIS.STRONG_LEADS.CHANGES_LIMIT);
    const moversOnly = !hasFlag(argv, 'all');

    const store = MySqlSnapshotStore.connect(loadAppConfig().db);
    try {
        const leads = await store.readStrongLeads(date);
        if (leads.length === 0) {
            console.log(`No strong leads stored for ${date}.`);
            return;
        }

        const changes = rankingChanges(leads, { moversOnly, limit });
        console.log(`\n🔀 TOP ${limit} STRONG-LEAD RANKING CHANGES (${date})`);
        console.log(changes.length > 0 ? rankingChangesTable(changes) : 'No ranking changes.');
    } finally {
        await store.close();
    }
};

run().catch((error: unknown) => {
    console.error('❌ Failed to load ranking changes:', error);
    process.exitCode = 1;
});
