import { RequestClient } from '../core/client.js';
import { type Logger, NoopLogger } from '../log/logger.js';
import type { Config, FetchClientProvider } from '../types/request.js';
import { type APIClients, APIClientsAPI } from './apiClients.js';
import { type BlockedProperties, BlockedPropertiesAPI } from './blockedProperties.js';
import { type CIDRBlocks, CIDRBlocksAPI } from './cidr.js';
import { type Credentials, CredentialsAPI } from './credentials.js';
import { type IAMEndpoints, iamEndpoints } from './endpoints.js';
import { type Groups, GroupsAPI } from './groups.js';
import { type IPAllowlist, IPAllowlistAPI } from './ipAllowlist.js';
import type { OperationContext } from './operation.js';
import { type Properties, PropertiesAPI } from './properties.js';
import { type Roles, RolesAPI } from './roles.js';
import { type Support, SupportAPI } from './support.js';
import { type UserLock, UserLockAPI } from './userLock.js';
import { type UserLookup, UserLookupAPI } from './userLookup.js';
import { type UserPassword, UserPasswordAPI } from './userPassword.js';
import { type Users, UsersAPI } from './users.js';

export interface IAMClientProps extends Config {
  /** API host or base URL, e.g. `akab-xxxx.luna.akamaiapis.net`. */
  baseUrl: string;
  /**
   * Transport for every request. Request signing belongs here; the default
   * transport sends requests unsigned.
   */
  fetchProvider?: FetchClientProvider;
  logger?: Logger;
}

/**
 * Client for the Identity and Access Management API. Each resource is its own
 * capability group, all sharing one transport:
 *
 * @example
 * const iam = createIAM({ baseUrl: 'akab-xxxx.luna.akamaiapis.net', fetchProvider: SignedFetch });
 * const [err, group] = await iam.groups.createGroup({ groupId: 12345, groupName: 'Engineering' });
 * if (isOperationError(err, 'create group')) {
 *   // ...
 * }
 */
export class IAMClient {
  readonly apiClients: APIClients;
  readonly credentials: Credentials;
  readonly cidrBlocks: CIDRBlocks;
  readonly ipAllowlist: IPAllowlist;
  readonly groups: Groups;
  readonly roles: Roles;
  readonly blockedProperties: BlockedProperties;
  readonly userLock: UserLock;
  readonly userPassword: UserPassword;
  readonly properties: Properties;
  readonly userLookup: UserLookup;
  readonly users: Users;
  readonly support: Support;

  #client: RequestClient<IAMEndpoints>;

  constructor({ baseUrl, fetchProvider, fetchOpts, logger = new NoopLogger() }: IAMClientProps) {
    this.#client = new RequestClient({ baseUrl, fetchProvider, fetchOpts, logger, endpoints: iamEndpoints });

    const ctx: OperationContext = { client: this.#client, logger };
    this.apiClients = new APIClientsAPI(ctx);
    this.credentials = new CredentialsAPI(ctx);
    this.cidrBlocks = new CIDRBlocksAPI(ctx);
    this.ipAllowlist = new IPAllowlistAPI(ctx);
    this.groups = new GroupsAPI(ctx);
    this.roles = new RolesAPI(ctx);
    this.blockedProperties = new BlockedPropertiesAPI(ctx);
    this.userLock = new UserLockAPI(ctx);
    this.userPassword = new UserPasswordAPI(ctx);
    this.properties = new PropertiesAPI(ctx);
    this.userLookup = new UserLookupAPI(ctx);
    this.users = new UsersAPI(ctx);
    this.support = new SupportAPI(ctx);
  }

  /** Updates default fetch options for every group at once. */
  config(config: Config) {
    this.#client.config(config);
  }
}

export function createIAM(props: IAMClientProps): IAMClient {
  return new IAMClient(props);
}
