import { OpenFgaClient } from '@openfga/sdk';
import { createLogger } from '../logging/logger.js';
import { DASHBOARD_AUTHORIZATION_MODEL } from './authorization-model.js';
import type { RelationStore, RelationTuple } from './relation-store.js';
import { DASHBOARD_OBJECT, formatUser } from './relation-store.js';

const log = createLogger('OpenFGA');

export const FGA_STORE_NAME = 'ml-platform-admin';

/** Prefix `http://` when the URL carries no scheme. */
export function normaliseApiUrl(apiUrl: string): string {
  return /^https?:\/\//.test(apiUrl) ? apiUrl : `http://${apiUrl}`;
}

export class FgaRelationStore implements RelationStore {
  constructor(private client: OpenFgaClient) {}

  async check(tuple: RelationTuple): Promise<boolean> {
    const response = await this.client.check(tuple);
    return response.allowed === true;
  }

  async write(tuples: RelationTuple[]): Promise<void> {
    if (tuples.length === 0) return;
    await this.client.writeTuples(tuples);
  }

  async delete(tuples: RelationTuple[]): Promise<void> {
    if (tuples.length === 0) return;
    await this.client.deleteTuples(tuples);
  }
}

async function findOrCreateStore(client: OpenFgaClient): Promise<string> {
  const { stores } = await client.listStores();
  const existing = stores.find((store) => store.name === FGA_STORE_NAME);
  if (existing) return existing.id;

  const created = await client.createStore({ name: FGA_STORE_NAME });
  log.info('Created OpenFGA store', { data: { storeId: created.id } });
  return created.id;
}

/**
 * Connect to OpenFGA: find or create the dashboard store, write the
 * authorization model and grant `admin` the dashboard admin relation.
 */
export async function initOpenFga(apiUrl: string): Promise<FgaRelationStore> {
  const url = normaliseApiUrl(apiUrl);
  const storeId = await findOrCreateStore(new OpenFgaClient({ apiUrl: url }));

  const model = await new OpenFgaClient({ apiUrl: url, storeId }).writeAuthorizationModel(
    DASHBOARD_AUTHORIZATION_MODEL
  );
  const client = new OpenFgaClient({
    apiUrl: url,
    storeId,
    authorizationModelId: model.authorization_model_id,
  });
  const store = new FgaRelationStore(client);

  const adminTuple = { user: formatUser('admin'), relation: 'admin', object: DASHBOARD_OBJECT };
  if (!(await store.check(adminTuple))) {
    await store.write([adminTuple]);
  }

  log.info('OpenFGA initialised', {
    data: { apiUrl: url, storeId, modelId: model.authorization_model_id },
  });
  return store;
}
