import type { RelationStore, RelationTuple } from '../lib/authz/relation-store.js';
import { DASHBOARD_OBJECT, formatObject, formatUser } from '../lib/authz/relation-store.js';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { AuthErrors } from '../lib/errors/auth-errors.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { attempt, ok } from '../lib/utils/result.js';

const log = createLogger('Authorization');

export const CLUSTER_RELATIONS = ['owner', 'member'] as const;
export type ClusterRelation = (typeof CLUSTER_RELATIONS)[number];

export function isClusterRelation(value: string): value is ClusterRelation {
  return value === 'owner' || value === 'member';
}

/** Map a requested cluster role onto the relation it is stored as. */
export function clusterRelationFor(role: string): ClusterRelation | undefined {
  switch (role.toLowerCase()) {
    case 'owner':
    case 'admin':
      return 'owner';
    case 'member':
    case 'read':
    case 'write':
      return 'member';
    default:
      return undefined;
  }
}

const clusterTuple = (username: string, relation: ClusterRelation, cluster: string): RelationTuple => ({
  user: formatUser(username),
  relation,
  object: formatObject('cluster', cluster),
});

/** Dashboard and cluster permission checks over the relation store. */
export class AuthorizationService {
  constructor(private store: RelationStore) {}

  private async check(tuple: RelationTuple): Promise<Result<boolean, AppError>> {
    return attempt(
      () => this.store.check(tuple),
      (error) => AuthErrors.PERMISSION_CHECK_FAILED(errorMessage(error))
    );
  }

  isDashboardAdmin(username: string): Promise<Result<boolean, AppError>> {
    return this.check({ user: formatUser(username), relation: 'admin', object: DASHBOARD_OBJECT });
  }

  hasClusterRelation(
    username: string,
    relation: ClusterRelation,
    cluster: string
  ): Promise<Result<boolean, AppError>> {
    return this.check(clusterTuple(username, relation, cluster));
  }

  /** Relations the user holds on the cluster, in `owner`, `member` order. */
  async clusterRelations(username: string, cluster: string): Promise<Result<ClusterRelation[], AppError>> {
    const held: ClusterRelation[] = [];
    for (const relation of CLUSTER_RELATIONS) {
      const result = await this.hasClusterRelation(username, relation, cluster);
      if (!result.ok) return result;
      if (result.value) held.push(relation);
    }
    return ok(held);
  }

  /** Admin, owner or member of the cluster. */
  async hasClusterAccess(username: string, cluster: string): Promise<Result<boolean, AppError>> {
    const admin = await this.isDashboardAdmin(username);
    if (!admin.ok || admin.value) return admin;
    const relations = await this.clusterRelations(username, cluster);
    return relations.ok ? ok(relations.value.length > 0) : relations;
  }

  async grantDashboardRole(username: string, role: 'admin' | 'basic_user'): Promise<Result<void, AppError>> {
    const tuple = { user: formatUser(username), relation: role, object: DASHBOARD_OBJECT };
    const existing = await this.check(tuple);
    if (!existing.ok) return existing;
    if (existing.value) return ok(undefined);
    return this.write([tuple]);
  }

  async grantClusterRelation(
    username: string,
    relation: ClusterRelation,
    cluster: string
  ): Promise<Result<void, AppError>> {
    const tuple = clusterTuple(username, relation, cluster);
    const existing = await this.check(tuple);
    if (!existing.ok) return existing;
    if (existing.value) return ok(undefined);
    return this.write([tuple]);
  }

  /** Replace the user's relations on the cluster with `relations`. */
  async setClusterRelations(
    username: string,
    cluster: string,
    relations: ClusterRelation[]
  ): Promise<Result<void, AppError>> {
    const current = await this.clusterRelations(username, cluster);
    if (!current.ok) return current;

    const removed = await attempt(
      () => this.store.delete(current.value.map((relation) => clusterTuple(username, relation, cluster))),
      (error) => AuthErrors.RELATION_WRITE_FAILED(errorMessage(error))
    );
    if (!removed.ok) return removed;

    const wanted = [...new Set(relations)];
    log.info('Cluster relations updated', { data: { username, cluster, relations: wanted } });
    return this.write(wanted.map((relation) => clusterTuple(username, relation, cluster)));
  }

  private write(tuples: RelationTuple[]): Promise<Result<void, AppError>> {
    return attempt(
      () => this.store.write(tuples),
      (error) => AuthErrors.RELATION_WRITE_FAILED(errorMessage(error))
    );
  }
}
