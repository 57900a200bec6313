import { createError } from './base.js';

export const ClusterErrors = {
  NOT_FOUND: (name: string) =>
    createError('CLUSTER_NOT_FOUND', `no cluster object ${name} found in karmada control Plane`, 404, {
      cluster: name,
    }),
  DELETE_TIMEOUT: (name: string) =>
    createError('CLUSTER_DELETE_TIMEOUT', `timed out waiting for cluster ${name} to be deleted`, 504, {
      cluster: name,
    }),
  ACCESS_DENIED: (name: string) =>
    createError('CLUSTER_ACCESS_DENIED', `access to cluster ${name} denied`, 403, { cluster: name }),
  EMPTY_USER_LIST: createError('CLUSTER_EMPTY_USER_LIST', 'users must not be empty', 400),
} as const;
