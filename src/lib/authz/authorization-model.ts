import type { WriteAuthorizationModelRequest } from '@openfga/sdk';

const userOnly = { directly_related_user_types: [{ type: 'user' }] };

export const DASHBOARD_AUTHORIZATION_MODEL: WriteAuthorizationModelRequest = {
  schema_version: '1.1',
  type_definitions: [
    { type: 'user' },
    {
      type: 'dashboard',
      relations: {
        admin: { this: {} },
        basic_user: { this: {} },
      },
      metadata: {
        relations: {
          admin: userOnly,
          basic_user: userOnly,
        },
      },
    },
    {
      type: 'cluster',
      relations: {
        owner: { this: {} },
        member: { this: {} },
      },
      metadata: {
        relations: {
          owner: userOnly,
          member: userOnly,
        },
      },
    },
  ],
};
