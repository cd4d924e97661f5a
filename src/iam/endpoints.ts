import type { RequestDefinitions } from '../core/types.js';
import { apiClientEndpoints } from './apiClients.js';
import { blockedPropertiesEndpoints } from './blockedProperties.js';
import { cidrEndpoints } from './cidr.js';
import { credentialEndpoints } from './credentials.js';
import { groupEndpoints } from './groups.js';
import { ipAllowlistEndpoints } from './ipAllowlist.js';
import { propertyEndpoints } from './properties.js';
import { roleEndpoints } from './roles.js';
import { supportEndpoints } from './support.js';
import { userLockEndpoints } from './userLock.js';
import { userLookupEndpoints } from './userLookup.js';
import { userPasswordEndpoints } from './userPassword.js';
import { userEndpoints } from './users.js';

/** Every IAM endpoint, keyed by path template. */
export const iamEndpoints = {
  ...apiClientEndpoints,
  ...credentialEndpoints,
  ...cidrEndpoints,
  ...ipAllowlistEndpoints,
  ...groupEndpoints,
  ...roleEndpoints,
  ...blockedPropertiesEndpoints,
  ...userLockEndpoints,
  ...userPasswordEndpoints,
  ...propertyEndpoints,
  ...userLookupEndpoints,
  ...userEndpoints,
  ...supportEndpoints,
} satisfies RequestDefinitions;

export type IAMEndpoints = typeof iamEndpoints;
