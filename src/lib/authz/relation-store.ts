export interface RelationTuple {
  user: string;
  relation: string;
  object: string;
}

/** Relationship tuples with point checks, as served by OpenFGA. */
export interface RelationStore {
  check(tuple: RelationTuple): Promise<boolean>;
  write(tuples: RelationTuple[]): Promise<void>;
  delete(tuples: RelationTuple[]): Promise<void>;
}

export const DASHBOARD_OBJECT = 'dashboard:dashboard';

export const formatUser = (username: string) => `user:${username}`;

export const formatObject = (type: string, id: string) => `${type}:${id}`;
