import { describe, it, expect, vi } from "vitest";
import { GitLabPlatform } from "./gitlab.js";
import { NonRetryableError } from "../retry.js";

vi.mock("../log.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../log.js")>();
  return { ...actual, debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
});

type Route = (url: URL, init: RequestInit | undefined) => Response | undefined;

function json(body: unknown, headers: Record<string, string> = {}, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function createClient(...routes: Route[]) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    for (const route of routes) {
      const response = route(url, init);
      if (response) return response;
    }
    return json({ message: "404 Not Found" }, {}, 404);
  });
  const client = new GitLabPlatform({
    url: "https://gitlab.example.com/",
    token: "test-secret",
    fetch: fetchMock,
    retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
  });
  return { client, fetchMock };
}

describe("GitLabPlatform", () => {
  it("sends the token and encodes path project ids", async () => {
    const { client, fetchMock } = createClient((url) =>
      url.pathname === "/api/v4/projects/group%2Fapp" ? json({ id: 1, name: "app" }) : undefined,
    );

    await expect(client.getProjectName("group/app")).resolves.toBe("app");
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({ "PRIVATE-TOKEN": "test-secret" });
  });

  it("follows x-next-page and drops protected branches", async () => {
    const { client } = createClient(
      (url) => (url.pathname.endsWith("/protected_branches") ? json([{ name: "main" }]) : undefined),
      (url) => {
        if (!url.pathname.endsWith("/repository/branches")) return undefined;
        if (url.searchParams.get("page") === "1") {
          return json(
            [
              { name: "main", commit: { committed_date: "2024-01-01T00:00:00Z" } },
              {
                name: "feature/a",
                commit: {
                  committed_date: "2024-01-02T00:00:00.000+01:00",
                  author_name: "Dee Dev",
                  author_email: "dee@example.com",
                  committer_email: "ci@example.com",
                },
              },
            ],
            { "x-next-page": "2" },
          );
        }
        return json([{ name: "release", protected: true, commit: null }, { name: "old", commit: null }], {
          "x-next-page": "",
        });
      },
    );

    await expect(client.listNonProtectedBranches("5")).resolves.toEqual([
      {
        name: "feature/a",
        committedDate: "2024-01-02T00:00:00.000+01:00",
        authorName: "Dee Dev",
        authorEmail: "dee@example.com",
        committerEmail: "ci@example.com",
      },
      { name: "old", committedDate: null, authorName: "", authorEmail: "", committerEmail: "" },
    ]);
  });

  it("maps open merge requests", async () => {
    const { client } = createClient((url) =>
      url.pathname === "/api/v4/projects/5/merge_requests" && url.searchParams.get("state") === "opened"
        ? json([
            {
              iid: 3,
              title: "Add login",
              web_url: "https://gitlab.example.com/g/app/-/merge_requests/3",
              source_branch: "feature/login",
              assignee: null,
              author: { username: "ann", name: "Ann Author" },
              updated_at: "2024-02-01T12:00:00Z",
            },
          ])
        : undefined,
    );

    await expect(client.listOpenRequests("5")).resolves.toEqual([
      {
        number: 3,
        title: "Add login",
        url: "https://gitlab.example.com/g/app/-/merge_requests/3",
        sourceBranch: "feature/login",
        sourceProject: null,
        fromFork: false,
        assignee: undefined,
        author: { username: "ann", name: "Ann Author", email: undefined },
        updatedAt: "2024-02-01T12:00:00Z",
      },
    ]);
  });

  it("flags fork merge requests and ignores them when looking up a branch", async () => {
    const fork = {
      iid: 8,
      title: "From a fork",
      web_url: "https://gitlab.example.com/g/app/-/merge_requests/8",
      source_branch: "feature/x",
      source_project_id: 77,
      target_project_id: 5,
      author: { username: "outsider" },
      updated_at: "2024-02-01T12:00:00Z",
    };
    const { client } = createClient((url) => {
      if (url.pathname !== "/api/v4/projects/5/merge_requests") return undefined;
      if (url.searchParams.get("source_branch") === "feature/x") return json([fork]);
      if (url.searchParams.get("source_branch") === "feature/y") {
        return json([
          { ...fork, source_branch: "feature/y" },
          { ...fork, iid: 9, source_branch: "feature/y", source_project_id: 5 },
        ]);
      }
      return json([fork]);
    });

    const [request] = await client.listOpenRequests("5");
    expect(request).toMatchObject({ number: 8, sourceProject: "77", fromFork: true });

    await expect(client.findOpenRequestForBranch("5", "feature/x")).resolves.toBeNull();
    await expect(client.findOpenRequestForBranch("5", "feature/y")).resolves.toMatchObject({
      number: 9,
      sourceProject: "5",
      fromFork: false,
    });
  });

  it("reads the newest note, falling back to its creation time", async () => {
    const { client } = createClient((url) =>
      url.pathname.endsWith("/merge_requests/3/notes") && url.searchParams.get("sort") === "desc"
        ? json([{ body: "hi", created_at: "2024-03-01T00:00:00Z", updated_at: null }])
        : undefined,
    );

    await expect(client.latestCommentInstant("5", 3)).resolves.toBe("2024-03-01T00:00:00Z");
  });

  it("resolves users", async () => {
    const { client } = createClient((url) => {
      if (url.pathname !== "/api/v4/users") return undefined;
      if (url.searchParams.get("username") === "ann") return json([{ email: "", public_email: "ann@example.com" }]);
      if (url.searchParams.get("search") === "ann@example.com") return json([{ state: "active" }]);
      return json([]);
    });

    await expect(client.resolveUserEmail("ann")).resolves.toBe("ann@example.com");
    await expect(client.resolveUserEmail("ghost")).resolves.toBeNull();
    await expect(client.isUserActive("ann@example.com")).resolves.toBe(true);
    await expect(client.isUserActive("ghost@example.com")).resolves.toBe(false);
  });

  it("closes, comments and deletes with the right verbs", async () => {
    const { client, fetchMock } = createClient(() => json({}));

    await client.postComment("5", 3, "ping");
    await client.closeRequest("5", 3);
    await client.deleteBranch("5", "feature/a");

    const calls = fetchMock.mock.calls.map(([input, init]) => [init?.method, String(input), init?.body]);
    expect(calls).toEqual([
      ["POST", "https://gitlab.example.com/api/v4/projects/5/merge_requests/3/notes", '{"body":"ping"}'],
      ["PUT", "https://gitlab.example.com/api/v4/projects/5/merge_requests/3", '{"state_event":"close"}'],
      ["DELETE", "https://gitlab.example.com/api/v4/projects/5/repository/branches/feature%2Fa", undefined],
    ]);
  });

  it("downloads the branch archive as bytes", async () => {
    const { client } = createClient((url) =>
      url.pathname.endsWith("/repository/archive.tar.gz") && url.searchParams.get("sha") === "feature/a"
        ? new Response(new Uint8Array([0x1f, 0x8b]), { headers: { "Content-Type": "application/x-gzip" } })
        : undefined,
    );

    await expect(client.downloadBranchArchive("5", "feature/a")).resolves.toEqual(new Uint8Array([0x1f, 0x8b]));
  });

  it("does not retry client errors", async () => {
    const { client, fetchMock } = createClient();

    await expect(client.getProjectName("9")).rejects.toBeInstanceOf(NonRetryableError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries server errors", async () => {
    let calls = 0;
    const { client, fetchMock } = createClient(() => {
      calls++;
      return calls === 1 ? json({ message: "boom" }, {}, 502) : json({ name: "app" });
    });

    await expect(client.getProjectName("5")).resolves.toBe("app");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
