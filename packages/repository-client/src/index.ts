import type { RepositoryClient } from "@commitlens/core";
import {
  BitbucketRepositoryClient,
  type BitbucketRepositoryClientOptions,
} from "./infrastructure/bitbucket-repository-client.js";

export {
  BitbucketRepositoryClient,
  CHANGES_PAGE_LIMIT,
  COMMITS_PAGE_LIMIT,
  type BasicCredentials,
  type BitbucketRepositoryClientOptions,
  type PagedResource,
  type RepositoryClientProgressEvent,
} from "./infrastructure/bitbucket-repository-client.js";
export { TransportError, type TransportErrorDetails } from "./infrastructure/transport-error.js";
export type { FetchLike } from "./infrastructure/fetch-json.js";

export const createBitbucketRepositoryClient = (
  options: BitbucketRepositoryClientOptions,
): RepositoryClient => new BitbucketRepositoryClient(options);
