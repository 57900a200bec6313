import { describe, expect, it } from 'vitest';
import { MemoryRelationStore } from '../../../tests/helpers/memory-stores.js';
import { AuthorizationService, clusterRelationFor } from '../authorization.service.js';

const tuple = (user: string, relation: string, object: string) => ({ user: `user:${user}`, relation, object });

describe('clusterRelationFor', () => {
  it('maps roles onto stored relations', () => {
    expect(clusterRelationFor('Admin')).toBe('owner');
    expect(clusterRelationFor('read')).toBe('member');
    expect(clusterRelationFor('viewer')).toBeUndefined();
  });
});

describe('AuthorizationService', () => {
  it('checks dashboard admins', async () => {
    const service = new AuthorizationService(new MemoryRelationStore([tuple('admin', 'admin', 'dashboard:dashboard')]));

    expect(await service.isDashboardAdmin('admin')).toEqual({ ok: true, value: true });
    expect(await service.isDashboardAdmin('bob')).toEqual({ ok: true, value: false });
  });

  it('wraps store failures', async () => {
    const store = new MemoryRelationStore();
    store.checkError = new Error('connection reset');

    expect(await new AuthorizationService(store).isDashboardAdmin('bob')).toEqual({
      ok: false,
      error: { code: 'AUTHZ_CHECK_FAILED', message: 'failed to check permissions: connection reset', status: 500 },
    });
  });

  it('lists cluster relations in order', async () => {
    const service = new AuthorizationService(
      new MemoryRelationStore([tuple('bob', 'member', 'cluster:member1'), tuple('bob', 'owner', 'cluster:member1')])
    );

    expect(await service.clusterRelations('bob', 'member1')).toEqual({ ok: true, value: ['owner', 'member'] });
    expect(await service.clusterRelations('bob', 'member2')).toEqual({ ok: true, value: [] });
  });

  it('grants access to admins and cluster members', async () => {
    const service = new AuthorizationService(
      new MemoryRelationStore([tuple('admin', 'admin', 'dashboard:dashboard'), tuple('bob', 'member', 'cluster:member1')])
    );

    expect(await service.hasClusterAccess('admin', 'member9')).toEqual({ ok: true, value: true });
    expect(await service.hasClusterAccess('bob', 'member1')).toEqual({ ok: true, value: true });
    expect(await service.hasClusterAccess('bob', 'member2')).toEqual({ ok: true, value: false });
  });

  it('replaces cluster relations', async () => {
    const store = new MemoryRelationStore([tuple('bob', 'owner', 'cluster:member1')]);
    const service = new AuthorizationService(store);

    expect(await service.setClusterRelations('bob', 'member1', ['member', 'member'])).toEqual({ ok: true, value: undefined });
    expect(store.has('bob', 'owner', 'cluster:member1')).toBe(false);
    expect(store.has('bob', 'member', 'cluster:member1')).toBe(true);
  });

  it('grants dashboard roles once', async () => {
    const store = new MemoryRelationStore();
    const service = new AuthorizationService(store);

    await service.grantDashboardRole('carol', 'basic_user');
    await service.grantDashboardRole('carol', 'basic_user');

    expect([...store.tuples]).toEqual(['user:carol#basic_user@dashboard:dashboard']);
  });
});
