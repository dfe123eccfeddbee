import 'dotenv/config';

import { loadAppConfig } from '../config/env';
import { MySqlSnapshotStore } from '../services/storage/mysqlStore';
import { prepareStore } from '../services/storage/prepareStore';

const run = async () => {
    const { db } = loadAppConfig();
    console.log(`🗄️  Preparing ${db.database} on ${db.host}:${db.port}`);

    await MySqlSnapshotStore.createDatabase(db);
    const store = await prepareStore(MySqlSnapshotStore.connect(db));
    await store.close();
    console.log('✅ Database ready');
};

run().catch((error: unknown) => {
    console.error('❌ Database setup failed:', error);
    process.exitCode = 1;
});
