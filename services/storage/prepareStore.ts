import { errorMessage } from '../utils/errors';

export interface MigratableStore {
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

/** Applies the schema; the store is closed again when that fails. */
export async function prepareStore<S extends MigratableStore>(store: S): Promise<S> {
  try {
    await store.ensureSchema();
  } catch (error) {
    try {
      await store.close();
    } catch (closeError) {
      console.error(`[Store] Error closing after failed schema setup: ${errorMessage(closeError)}`);
    }
    throw error;
  }
  return store;
}
