import { describe, expect, it } from "vitest";
import {
  BitbucketRepositoryClient,
  type RepositoryClientProgressEvent,
} from "./bitbucket-repository-client.js";
import type { FetchLike } from "./fetch-json.js";
import { TransportError } from "./transport-error.js";

type StubResponse = { status?: number; body: unknown } | Error;

const API_BASE = "https://bitbucket.example.com/rest/api/1.0/projects/PRJ/repos/app";

const createFetchStub = (responses: readonly StubResponse[]) => {
  const requests: Array<{ url: string; headers: Headers }> = [];
  let index = 0;

  const fetchFn: FetchLike = async (url, init) => {
    requests.push({ url, headers: new Headers(init.headers) });
    const next = responses[index];
    index += 1;
    if (next === undefined) {
      throw new Error(`unexpected request: ${url}`);
    }

    if (next instanceof Error) {
      throw next;
    }

    const raw = typeof next.body === "string" ? next.body : JSON.stringify(next.body);
    return new Response(raw, { status: next.status ?? 200 });
  };

  return { fetchFn, requests };
};

const createClient = (
  fetchFn: FetchLike,
  onProgress?: (event: RepositoryClientProgressEvent) => void,
): BitbucketRepositoryClient =>
  new BitbucketRepositoryClient({
    baseUrl: "https://bitbucket.example.com/",
    projectKey: "PRJ",
    repositorySlug: "app",
    credentials: { username: "test-user", password: "test-secret" },
    fetch: fetchFn,
    ...(onProgress === undefined ? {} : { onProgress }),
  });

const commitPayload = (id: string, parents: readonly string[]) => ({
  id,
  parents: parents.map((parentId) => ({ id: parentId })),
  author: { name: "Alice", emailAddress: "alice@example.com" },
  authorTimestamp: 1700000000000,
});

describe("BitbucketRepositoryClient", () => {
  it("follows nextPageStart until the last commit page", async () => {
    const stub = createFetchStub([
      {
        body: {
          values: [commitPayload("c3", ["c2"]), commitPayload("c2", ["c1"])],
          isLastPage: false,
          nextPageStart: 2,
        },
      },
      { body: { values: [commitPayload("c1", [])], isLastPage: true } },
    ]);

    const commits = await createClient(stub.fetchFn).fetchCommits("main");

    expect(commits.map((commit) => commit.id)).toEqual(["c3", "c2", "c1"]);
    expect(commits[0]).toEqual({
      id: "c3",
      parents: ["c2"],
      authorName: "Alice",
      authorTimestamp: 1700000000000,
    });
    expect(stub.requests.map((request) => request.url)).toEqual([
      `${API_BASE}/commits?until=main&start=0&limit=100`,
      `${API_BASE}/commits?until=main&start=2&limit=100`,
    ]);
  });

  it("sends basic credentials and accepts json", async () => {
    const stub = createFetchStub([{ body: { values: [], isLastPage: true } }]);

    await createClient(stub.fetchFn).fetchCommits("main");

    expect(stub.requests[0]?.headers.get("authorization")).toBe("Basic dGVzdC11c2VyOnRlc3Qtc2VjcmV0");
    expect(stub.requests[0]?.headers.get("accept")).toBe("application/json");
  });

  it("omits since when listing changes without a baseline", async () => {
    const stub = createFetchStub([
      {
        body: {
          values: [
            {
              path: { toString: "src/a.ts" },
              type: "ADD",
              executable: false,
            },
          ],
          isLastPage: true,
        },
      },
      { body: { values: [], isLastPage: true } },
    ]);
    const client = createClient(stub.fetchFn);

    const changes = await client.fetchCommitChanges("c1", null);
    await client.fetchCommitChanges("c3", "c1");

    expect(changes).toEqual([
      {
        path: "src/a.ts",
        srcPath: null,
        changeType: "ADD",
        srcExecutable: false,
        executable: false,
      },
    ]);
    expect(stub.requests.map((request) => request.url)).toEqual([
      `${API_BASE}/commits/c1/changes?start=0&limit=1000`,
      `${API_BASE}/commits/c3/changes?since=c1&start=0&limit=1000`,
    ]);
  });

  it("fetches a file diff with an encoded path", async () => {
    const stub = createFetchStub([
      {
        body: {
          diffs: [
            {
              hunks: [
                {
                  segments: [
                    { type: "ADDED", lines: [{ line: "const a = 1;" }, { line: "" }] },
                    { type: "CONTEXT", lines: [{ line: "export {};" }] },
                  ],
                },
              ],
            },
          ],
        },
      },
    ]);

    const diff = await createClient(stub.fetchFn).fetchFileDiff("c3", "c1", "src/my file.ts");

    expect(diff).toEqual({
      diffs: [
        {
          hunks: [
            {
              segments: [
                { type: "ADDED", lines: ["const a = 1;", ""] },
                { type: "CONTEXT", lines: ["export {};"] },
              ],
            },
          ],
        },
      ],
    });
    expect(stub.requests[0]?.url).toBe(`${API_BASE}/diff/src/my%20file.ts?since=c1&until=c3`);
  });

  it("wraps non-success statuses in a TransportError", async () => {
    const stub = createFetchStub([{ status: 401, body: { errors: [] } }]);

    const failure = await createClient(stub.fetchFn)
      .fetchCommits("main")
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({
      status: 401,
      url: `${API_BASE}/commits?until=main&start=0&limit=100`,
      message: "request failed with status 401",
    });
  });

  it("wraps network failures with the original cause", async () => {
    const cause = new Error("connect ECONNREFUSED");
    const stub = createFetchStub([cause]);

    const failure = await createClient(stub.fetchFn)
      .fetchFileDiff("c2", null, "a.txt")
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ status: null, message: "request failed: connect ECONNREFUSED" });
    expect(failure instanceof TransportError ? failure.cause : undefined).toBe(cause);
  });

  it("follows nextPageStart across change pages", async () => {
    const stub = createFetchStub([
      {
        body: {
          values: [{ path: { toString: "src/a.ts" }, type: "MODIFY" }],
          isLastPage: false,
          nextPageStart: 1000,
        },
      },
      {
        body: {
          values: [
            {
              path: { toString: "docs/new.md" },
              srcPath: { toString: "docs/old.md" },
              type: "MOVE",
            },
          ],
          isLastPage: true,
        },
      },
    ]);

    const changes = await createClient(stub.fetchFn).fetchCommitChanges("c3", "c1");

    expect(changes.map((entry) => [entry.path, entry.srcPath, entry.changeType])).toEqual([
      ["src/a.ts", null, "MODIFY"],
      ["docs/new.md", "docs/old.md", "MOVE"],
    ]);
    expect(stub.requests.map((request) => request.url)).toEqual([
      `${API_BASE}/commits/c3/changes?since=c1&start=0&limit=1000`,
      `${API_BASE}/commits/c3/changes?since=c1&start=1000&limit=1000`,
    ]);
  });

  it("aborts the change listing when a later page fails", async () => {
    const stub = createFetchStub([
      {
        body: {
          values: [{ path: { toString: "src/a.ts" }, type: "ADD" }],
          isLastPage: false,
          nextPageStart: 1000,
        },
      },
      { status: 500, body: "server error" },
    ]);

    const failure = await createClient(stub.fetchFn)
      .fetchCommitChanges("c1", null)
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({
      status: 500,
      url: `${API_BASE}/commits/c1/changes?start=1000&limit=1000`,
    });
  });

  it("aborts the whole listing when a later page fails", async () => {
    const stub = createFetchStub([
      { body: { values: [commitPayload("c2", ["c1"])], isLastPage: false, nextPageStart: 1 } },
      { status: 503, body: "unavailable" },
    ]);

    await expect(createClient(stub.fetchFn).fetchCommits("main")).rejects.toBeInstanceOf(
      TransportError,
    );
    expect(stub.requests).toHaveLength(2);
  });

  it("rejects malformed bodies", async () => {
    const stub = createFetchStub([{ body: { values: "nope", isLastPage: true } }, { body: "{" }]);
    const client = createClient(stub.fetchFn);

    await expect(client.fetchCommits("main")).rejects.toThrow(
      "malformed response body (invalid_page_values)",
    );
    await expect(client.fetchCommits("main")).rejects.toBeInstanceOf(TransportError);
  });

  it("reports page progress", async () => {
    const events: RepositoryClientProgressEvent[] = [];
    const stub = createFetchStub([
      { body: { values: [commitPayload("c2", ["c1"])], isLastPage: false, nextPageStart: 1 } },
      { body: { values: [commitPayload("c1", [])], isLastPage: true } },
    ]);

    await createClient(stub.fetchFn, (event) => events.push(event)).fetchCommits("main");

    expect(events.filter((event) => event.stage !== "request_started")).toEqual([
      { stage: "page_fetched", resource: "commits", start: 0, size: 1, isLastPage: false },
      { stage: "page_fetched", resource: "commits", start: 1, size: 1, isLastPage: true },
      { stage: "resource_fetched", resource: "commits", total: 2 },
    ]);
  });
});
