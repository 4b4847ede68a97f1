import { z } from "zod";
import { HttpError, withRetry, type RetryOptions } from "../retry.js";
import type { HostingPlatform, RawBranch, RawComment, RawRequest, RawUser } from "../types/index.js";
import * as log from "../log.js";

const PAGE_SIZE = 100;

const ProjectSchema = z.object({ name: z.string() });

const NamedSchema = z.object({ name: z.string() });

const BranchSchema = z.object({
  name: z.string(),
  protected: z.boolean().optional(),
  commit: z
    .object({
      committed_date: z.string().nullish(),
      author_name: z.string().nullish(),
      author_email: z.string().nullish(),
      committer_email: z.string().nullish(),
    })
    .nullish(),
});

const UserRefSchema = z.object({
  username: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
});

const MergeRequestSchema = z.object({
  iid: z.number(),
  title: z.string(),
  web_url: z.string(),
  source_branch: z.string(),
  source_project_id: z.number().nullish(),
  target_project_id: z.number().nullish(),
  assignee: UserRefSchema.nullish(),
  author: UserRefSchema.nullish(),
  updated_at: z.string().nullish(),
});

const NoteSchema = z.object({
  body: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

const UserSchema = z.object({
  state: z.string().nullish(),
  email: z.string().nullish(),
  public_email: z.string().nullish(),
});

type MergeRequest = z.infer<typeof MergeRequestSchema>;
type UserRef = z.infer<typeof UserRefSchema>;

export interface GitLabClientOptions {
  /** Instance root, e.g. "https://gitlab.example.com". */
  url: string;
  token: string;
  fetch?: typeof fetch;
  retry?: RetryOptions;
}

type Query = Record<string, string | number | undefined>;

function toRawUser(user: UserRef | null | undefined): RawUser | undefined {
  if (!user) return undefined;
  return { username: user.username, name: user.name ?? undefined, email: user.email ?? undefined };
}

function toRawRequest(mr: MergeRequest): RawRequest {
  return {
    number: mr.iid,
    title: mr.title,
    url: mr.web_url,
    sourceBranch: mr.source_branch,
    sourceProject: mr.source_project_id != null ? String(mr.source_project_id) : null,
    fromFork:
      mr.source_project_id != null && mr.target_project_id != null && mr.source_project_id !== mr.target_project_id,
    assignee: toRawUser(mr.assignee),
    author: toRawUser(mr.author),
    updatedAt: mr.updated_at ?? null,
  };
}

/** GitLab REST v4 over fetch. Reads are retried; writes are sent once. */
export class GitLabPlatform implements HostingPlatform {
  readonly kind = "gitlab" as const;
  readonly requestNoun = "merge request";
  readonly requestPrefix = "!";

  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitLabClientOptions) {
    this.apiBase = `${options.url.replace(/\/+$/, "")}/api/v4`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getProjectName(projectId: string): Promise<string> {
    const project = await this.getJson(`/projects/${encodeURIComponent(projectId)}`, ProjectSchema);
    return project.name;
  }

  async listNonProtectedBranches(projectId: string): Promise<RawBranch[]> {
    const base = `/projects/${encodeURIComponent(projectId)}`;
    const protectedNames = new Set(
      (await this.getAllPages(`${base}/protected_branches`, NamedSchema)).map((b) => b.name),
    );

    const branches: RawBranch[] = [];
    for (const branch of await this.getAllPages(`${base}/repository/branches`, BranchSchema)) {
      if (branch.protected || protectedNames.has(branch.name)) {
        log.debug(`Skipping protected branch: ${branch.name}`);
        continue;
      }
      branches.push({
        name: branch.name,
        committedDate: branch.commit?.committed_date ?? null,
        authorName: branch.commit?.author_name ?? "",
        authorEmail: branch.commit?.author_email ?? "",
        committerEmail: branch.commit?.committer_email ?? "",
      });
    }
    return branches;
  }

  async listOpenRequests(projectId: string): Promise<RawRequest[]> {
    const mrs = await this.getAllPages(`/projects/${encodeURIComponent(projectId)}/merge_requests`, MergeRequestSchema, {
      state: "opened",
    });
    return mrs.map(toRawRequest);
  }

  async latestCommentInstant(projectId: string, requestNumber: number): Promise<string | null> {
    const notes = await this.getJson(
      `/projects/${encodeURIComponent(projectId)}/merge_requests/${requestNumber}/notes`,
      z.array(NoteSchema),
      { order_by: "updated_at", sort: "desc", per_page: 1 },
    );
    const note = notes[0];
    if (!note) return null;
    return note.updated_at || note.created_at || null;
  }

  /** Fork merge requests can share the branch name; only same-project sources count. */
  async findOpenRequestForBranch(projectId: string, branchName: string): Promise<RawRequest | null> {
    const mrs = await this.getAllPages(`/projects/${encodeURIComponent(projectId)}/merge_requests`, MergeRequestSchema, {
      state: "opened",
      source_branch: branchName,
    });
    return mrs.map(toRawRequest).find((mr) => !mr.fromFork) ?? null;
  }

  async resolveUserEmail(username: string): Promise<string | null> {
    const users = await this.getJson("/users", z.array(UserSchema), { username, per_page: 1 });
    const user = users[0];
    if (!user) return null;
    return user.email || user.public_email || null;
  }

  async isUserActive(email: string): Promise<boolean> {
    const users = await this.getJson("/users", z.array(UserSchema), { search: email, per_page: 1 });
    return users[0]?.state === "active";
  }

  async downloadBranchArchive(projectId: string, branchName: string): Promise<Uint8Array> {
    const path = `/projects/${encodeURIComponent(projectId)}/repository/archive.tar.gz`;
    return withRetry(
      `GET ${path}`,
      async () => {
        const response = await this.send("GET", path, { sha: branchName });
        return new Uint8Array(await response.arrayBuffer());
      },
      this.options.retry,
    );
  }

  async postComment(projectId: string, requestNumber: number, body: string): Promise<void> {
    await this.send("POST", `/projects/${encodeURIComponent(projectId)}/merge_requests/${requestNumber}/notes`, {}, { body });
  }

  async closeRequest(projectId: string, requestNumber: number): Promise<void> {
    await this.send("PUT", `/projects/${encodeURIComponent(projectId)}/merge_requests/${requestNumber}`, {}, {
      state_event: "close",
    });
  }

  async deleteBranch(projectId: string, branchName: string): Promise<void> {
    await this.send(
      "DELETE",
      `/projects/${encodeURIComponent(projectId)}/repository/branches/${encodeURIComponent(branchName)}`,
    );
  }

  async listRecentComments(projectId: string, requestNumber: number, limit = 20): Promise<RawComment[]> {
    const notes = await this.getJson(
      `/projects/${encodeURIComponent(projectId)}/merge_requests/${requestNumber}/notes`,
      z.array(NoteSchema),
      { order_by: "created_at", sort: "desc", per_page: limit },
    );
    return notes.map((note) => ({ body: note.body ?? "" }));
  }

  private buildUrl(path: string, query: Query): string {
    const url = new URL(`${this.apiBase}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async send(method: string, path: string, query: Query = {}, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { "PRIVATE-TOKEN": this.options.token };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    const response = await this.fetchImpl(this.buildUrl(path, query), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new HttpError(response.status, `${response.status} ${response.statusText}${detail ? `: ${detail}` : ""}`);
    }
    return response;
  }

  private async getPage<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: Query): Promise<{ data: T; nextPage: string | null }> {
    const response = await this.send("GET", path, query);
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected response from GET ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return { data: parsed.data, nextPage: response.headers.get("x-next-page") || null };
  }

  private getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: Query = {}): Promise<T> {
    return withRetry(`GET ${path}`, async () => (await this.getPage(path, schema, query)).data, this.options.retry);
  }

  private async getAllPages<T>(path: string, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>, query: Query = {}): Promise<T[]> {
    const items: T[] = [];
    let page: string | null = "1";
    while (page) {
      const current: string = page;
      const result = await withRetry(
        `GET ${path} (page ${current})`,
        () => this.getPage(path, z.array(itemSchema), { ...query, per_page: PAGE_SIZE, page: current }),
        this.options.retry,
      );
      items.push(...result.data);
      page = result.nextPage;
    }
    return items;
  }
}
