import 'dotenv/config';

import { loadAppConfig } from '../config/env';
import { MySqlSnapshotStore } from '../services/storage/mysqlStore';
import { createApp } from './app';

const PORT = Number(process.env.PORT) || 3001;

const store = MySqlSnapshotStore.connect(loadAppConfig().db);
const app = createApp(store);

const server = app.listen(PORT, () => {
    console.log(`Server running on http://localhost:${PORT}`);
});

process.on('SIGINT', () => {
    server.close();
    store.close().catch((error: unknown) => console.error('[API] Failed to close store:', error));
});
