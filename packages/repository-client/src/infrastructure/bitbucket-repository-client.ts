import type { Commit, FileChange, FileDiff, RepositoryClient } from "@commitlens/core";
import {
  MalformedPayloadError,
  parseCommit,
  parseFileChange,
  parseFileDiff,
  parsePage,
} from "../parsing/bitbucket-payload-parser.js";
import { fetchJson, type FetchLike } from "./fetch-json.js";
import { TransportError } from "./transport-error.js";

export const COMMITS_PAGE_LIMIT = 100;
export const CHANGES_PAGE_LIMIT = 1000;

export type PagedResource = "commits" | "changes";

export type RepositoryClientProgressEvent =
  | { stage: "request_started"; url: string }
  | {
      stage: "page_fetched";
      resource: PagedResource;
      start: number;
      size: number;
      isLastPage: boolean;
    }
  | { stage: "resource_fetched"; resource: PagedResource; total: number };

export type BasicCredentials = {
  username: string;
  password: string;
};

export type BitbucketRepositoryClientOptions = {
  baseUrl: string;
  projectKey: string;
  repositorySlug: string;
  credentials: BasicCredentials;
  fetch?: FetchLike;
  onProgress?: (event: RepositoryClientProgressEvent) => void;
};

type QueryParams = Readonly<Record<string, string | number | null>>;

const encodeFilePath = (filePath: string): string =>
  filePath
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");

const toBasicAuthorization = (credentials: BasicCredentials): string =>
  `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString("base64")}`;

export class BitbucketRepositoryClient implements RepositoryClient {
  readonly apiBase: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchFn: FetchLike;
  private readonly onProgress: ((event: RepositoryClientProgressEvent) => void) | undefined;

  constructor(options: BitbucketRepositoryClientOptions) {
    const baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiBase = `${baseUrl}/rest/api/1.0/projects/${encodeURIComponent(options.projectKey)}/repos/${encodeURIComponent(options.repositorySlug)}`;
    this.headers = {
      Accept: "application/json",
      Authorization: toBasicAuthorization(options.credentials),
    };
    this.fetchFn = options.fetch ?? fetch;
    this.onProgress = options.onProgress;
  }

  async fetchCommits(branch: string): Promise<readonly Commit[]> {
    return this.fetchAllPages("commits", "/commits", { until: branch }, COMMITS_PAGE_LIMIT, parseCommit);
  }

  async fetchCommitChanges(
    currentCommitId: string,
    previousCommitId: string | null,
  ): Promise<readonly FileChange[]> {
    return this.fetchAllPages(
      "changes",
      `/commits/${encodeURIComponent(currentCommitId)}/changes`,
      { since: previousCommitId },
      CHANGES_PAGE_LIMIT,
      parseFileChange,
    );
  }

  async fetchFileDiff(
    currentCommitId: string,
    previousCommitId: string | null,
    filePath: string,
  ): Promise<FileDiff> {
    return this.request(
      `/diff/${encodeFilePath(filePath)}`,
      { since: previousCommitId, until: currentCommitId },
      parseFileDiff,
    );
  }

  buildUrl(endpoint: string, params: QueryParams): string {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== null) {
        query.set(key, String(value));
      }
    }

    const serialized = query.toString();
    return serialized.length === 0
      ? `${this.apiBase}${endpoint}`
      : `${this.apiBase}${endpoint}?${serialized}`;
  }

  private async request<T>(
    endpoint: string,
    params: QueryParams,
    parse: (body: unknown) => T,
  ): Promise<T> {
    const url = this.buildUrl(endpoint, params);
    this.onProgress?.({ stage: "request_started", url });
    const body = await fetchJson(this.fetchFn, url, this.headers);

    try {
      return parse(body);
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        throw new TransportError(`malformed response body (${error.message})`, {
          url,
          status: null,
          cause: error,
        });
      }

      throw error;
    }
  }

  private async fetchAllPages<T>(
    resource: PagedResource,
    endpoint: string,
    params: QueryParams,
    limit: number,
    parseValue: (value: unknown) => T,
  ): Promise<readonly T[]> {
    const collected: T[] = [];
    let start = 0;

    // Terminates on isLastPage; a non-final page without nextPageStart is rejected by parsePage.
    while (true) {
      const page = await this.request(endpoint, { ...params, start, limit }, (body) =>
        parsePage(body, parseValue),
      );
      collected.push(...page.values);
      this.onProgress?.({
        stage: "page_fetched",
        resource,
        start,
        size: page.values.length,
        isLastPage: page.isLastPage,
      });

      if (page.isLastPage || page.nextPageStart === null) {
        break;
      }

      start = page.nextPageStart;
    }

    this.onProgress?.({ stage: "resource_fetched", resource, total: collected.length });
    return collected;
  }
}
