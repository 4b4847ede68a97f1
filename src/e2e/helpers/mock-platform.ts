import { vi } from "vitest";
import { HttpError } from "../../retry.js";
import type {
  HostingPlatform,
  PlatformKind,
  RawBranch,
  RawComment,
  RawRequest,
} from "../../types/index.js";

export interface MockComment {
  body: string;
  updatedAt: string;
}

export interface MockProject {
  name: string;
  branches?: RawBranch[];
  requests?: RawRequest[];
  comments?: Record<number, MockComment[]>;
}

export interface MockPlatformOptions {
  kind?: PlatformKind;
  projects: Record<string, MockProject>;
  /** username → email, for assignees/authors known only by username */
  users?: Record<string, string>;
  activeEmails?: string[];
  archiveBytes?: Uint8Array;
  /** Timestamp stamped on comments posted through the mock. */
  commentClock?: () => string;
}

export function makeBranch(
  name: string,
  committedDate: string | null,
  overrides: Partial<RawBranch> = {},
): RawBranch {
  return {
    name,
    committedDate,
    authorName: "Dev Eloper",
    authorEmail: "dev@example.com",
    committerEmail: "dev@example.com",
    ...overrides,
  };
}

export function makeRequest(
  number: number,
  sourceBranch: string,
  updatedAt: string | null,
  overrides: Partial<RawRequest> = {},
): RawRequest {
  return {
    number,
    title: `Change ${number}`,
    url: `https://git.example.com/group/app/-/merge_requests/${number}`,
    sourceBranch,
    sourceProject: null,
    fromFork: false,
    author: { username: "author", email: "author@example.com", name: "Ann Author" },
    updatedAt,
    ...overrides,
  };
}

/**
 * In-memory HostingPlatform. Every method is a vi.fn backed by mutable
 * project state, so tests can both assert calls and override behaviour with
 * mockRejectedValueOnce.
 */
export function createMockPlatform(options: MockPlatformOptions) {
  const kind = options.kind ?? "gitlab";
  const projects = new Map<string, Required<MockProject>>();
  for (const [id, p] of Object.entries(options.projects)) {
    projects.set(id, {
      name: p.name,
      branches: [...(p.branches ?? [])],
      requests: [...(p.requests ?? [])],
      comments: { ...(p.comments ?? {}) },
    });
  }
  const users = new Map(Object.entries(options.users ?? {}));
  const active = new Set((options.activeEmails ?? []).map((e) => e.toLowerCase()));
  const clock = options.commentClock ?? (() => new Date().toISOString());

  function project(projectId: string): Required<MockProject> {
    const p = projects.get(projectId);
    if (!p) throw new HttpError(404, `404 Project Not Found: ${projectId}`);
    return p;
  }

  function commentsOf(projectId: string, number: number): MockComment[] {
    const p = project(projectId);
    p.comments[number] ??= [];
    return p.comments[number];
  }

  const platform = {
    kind,
    requestNoun: kind === "gitlab" ? "merge request" : "pull request",
    requestPrefix: kind === "gitlab" ? "!" : "#",

    getProjectName: vi.fn(async (projectId: string): Promise<string> => project(projectId).name),

    listNonProtectedBranches: vi.fn(async (projectId: string): Promise<RawBranch[]> => [
      ...project(projectId).branches,
    ]),

    listOpenRequests: vi.fn(async (projectId: string): Promise<RawRequest[]> => [
      ...project(projectId).requests,
    ]),

    latestCommentInstant: vi.fn(async (projectId: string, number: number): Promise<string | null> => {
      const stamps = commentsOf(projectId, number).map((c) => c.updatedAt).sort();
      return stamps.length > 0 ? stamps[stamps.length - 1] : null;
    }),

    findOpenRequestForBranch: vi.fn(async (projectId: string, branchName: string): Promise<RawRequest | null> =>
      project(projectId).requests.find((r) => r.sourceBranch === branchName && !r.fromFork) ?? null,
    ),

    resolveUserEmail: vi.fn(async (username: string): Promise<string | null> => users.get(username) ?? null),

    isUserActive: vi.fn(async (email: string): Promise<boolean> => active.has(email.toLowerCase())),

    downloadBranchArchive: vi.fn(async (projectId: string, branchName: string): Promise<Uint8Array> => {
      if (!project(projectId).branches.some((b) => b.name === branchName)) {
        throw new HttpError(404, `404 Branch Not Found: ${branchName}`);
      }
      return options.archiveBytes ?? new Uint8Array([0x1f, 0x8b, 0x08, 0x00]);
    }),

    postComment: vi.fn(async (projectId: string, number: number, body: string): Promise<void> => {
      commentsOf(projectId, number).push({ body, updatedAt: clock() });
    }),

    closeRequest: vi.fn(async (projectId: string, number: number): Promise<void> => {
      const p = project(projectId);
      p.requests = p.requests.filter((r) => r.number !== number);
    }),

    deleteBranch: vi.fn(async (projectId: string, branchName: string): Promise<void> => {
      const p = project(projectId);
      p.branches = p.branches.filter((b) => b.name !== branchName);
    }),

    listRecentComments: vi.fn(async (projectId: string, number: number, limit = 20): Promise<RawComment[]> =>
      [...commentsOf(projectId, number)]
        .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
        .slice(0, limit)
        .map((c) => ({ body: c.body })),
    ),

    /** Live project state, for assertions after a run. */
    state: projects,
  } satisfies HostingPlatform & { state: Map<string, Required<MockProject>> };

  return platform;
}

export type MockPlatform = ReturnType<typeof createMockPlatform>;
