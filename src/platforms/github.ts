import { Octokit } from "@octokit/rest";
import { withRetry, type RetryOptions } from "../retry.js";
import type { HostingPlatform, RawBranch, RawComment, RawRequest, RawUser } from "../types/index.js";
import * as log from "../log.js";

type RepoRef = {
  owner: string;
  repo: string;
};

interface GitHubUser {
  login: string;
  name?: string | null;
  email?: string | null;
}

interface GitHubPull {
  number: number;
  title: string;
  html_url: string;
  head: { ref: string; repo: { full_name: string } | null };
  base: { repo: { full_name: string } };
  assignee?: GitHubUser | null;
  user: GitHubUser | null;
  updated_at: string;
}

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  /** Passed to Octokit's request layer; tests inject an in-process fetch. */
  fetch?: typeof fetch;
  retry?: RetryOptions;
}

/** "owner/repo" → { owner, repo }. */
export function parseRepoRef(projectId: string): RepoRef {
  const parts = projectId.split("/");
  const [owner, repo] = parts;
  if (parts.length !== 2 || !owner || !repo) {
    throw new Error(`GitHub project '${projectId}' must be in "owner/repo" form`);
  }
  return { owner, repo };
}

function toRawUser(user: GitHubUser | null | undefined): RawUser | undefined {
  if (!user) return undefined;
  return { username: user.login, name: user.name ?? undefined, email: user.email ?? undefined };
}

/** A head repository GitHub no longer reports (deleted fork) counts as a fork. */
function toRawRequest(pull: GitHubPull): RawRequest {
  const sourceProject = pull.head.repo?.full_name ?? null;
  return {
    number: pull.number,
    title: pull.title,
    url: pull.html_url,
    sourceBranch: pull.head.ref,
    sourceProject,
    fromFork: sourceProject === null || sourceProject.toLowerCase() !== pull.base.repo.full_name.toLowerCase(),
    assignee: toRawUser(pull.assignee),
    author: toRawUser(pull.user),
    updatedAt: pull.updated_at || null,
  };
}

/** GitHub REST via Octokit. Reads are retried; writes are sent once. */
export class GitHubPlatform implements HostingPlatform {
  readonly kind = "github" as const;
  readonly requestNoun = "pull request";
  readonly requestPrefix = "#";

  private readonly octokit: Octokit;

  constructor(private readonly options: GitHubClientOptions) {
    this.octokit = new Octokit({
      auth: options.token,
      ...(options.apiUrl ? { baseUrl: options.apiUrl.replace(/\/+$/, "") } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    });
  }

  async getProjectName(projectId: string): Promise<string> {
    const ref = parseRepoRef(projectId);
    const { data } = await this.read(`get repo ${projectId}`, () => this.octokit.repos.get(ref));
    return data.name;
  }

  async listNonProtectedBranches(projectId: string): Promise<RawBranch[]> {
    const ref = parseRepoRef(projectId);
    const all = await this.read(`list branches of ${projectId}`, () =>
      this.octokit.paginate(this.octokit.repos.listBranches, { ...ref, per_page: 100 }),
    );

    const branches: RawBranch[] = [];
    for (const branch of all) {
      if (branch.protected) {
        log.debug(`Skipping protected branch: ${branch.name}`);
        continue;
      }
      const { data: commit } = await this.read(`get commit ${branch.commit.sha}`, () =>
        this.octokit.repos.getCommit({ ...ref, ref: branch.commit.sha }),
      );
      branches.push({
        name: branch.name,
        committedDate: commit.commit.committer?.date ?? null,
        authorName: commit.commit.author?.name ?? "",
        authorEmail: commit.commit.author?.email ?? "",
        committerEmail: commit.commit.committer?.email ?? "",
      });
    }
    return branches;
  }

  async listOpenRequests(projectId: string): Promise<RawRequest[]> {
    const ref = parseRepoRef(projectId);
    const pulls = await this.read(`list pull requests of ${projectId}`, () =>
      this.octokit.paginate(this.octokit.pulls.list, { ...ref, state: "open", per_page: 100 }),
    );
    return pulls.map(toRawRequest);
  }

  async latestCommentInstant(projectId: string, requestNumber: number): Promise<string | null> {
    const comments = await this.listIssueComments(projectId, requestNumber);
    let newest: string | null = null;
    for (const comment of comments) {
      const instant = comment.updated_at || comment.created_at;
      if (instant && (newest === null || Date.parse(instant) > Date.parse(newest))) newest = instant;
    }
    return newest;
  }

  async findOpenRequestForBranch(projectId: string, branchName: string): Promise<RawRequest | null> {
    const ref = parseRepoRef(projectId);
    const { data } = await this.read(`find pull request for ${branchName}`, () =>
      this.octokit.pulls.list({ ...ref, state: "open", head: `${ref.owner}:${branchName}`, per_page: 100 }),
    );
    return data.map(toRawRequest).find((pull) => !pull.fromFork) ?? null;
  }

  async resolveUserEmail(username: string): Promise<string | null> {
    const { data } = await this.read(`get user ${username}`, () => this.octokit.users.getByUsername({ username }));
    return data.email || null;
  }

  /** GitHub has no blocked state; a user is active when an email search finds them. */
  async isUserActive(email: string): Promise<boolean> {
    const { data } = await this.read(`search user ${email}`, () =>
      this.octokit.search.users({ q: `${email} in:email`, per_page: 1 }),
    );
    return data.items.length > 0;
  }

  async downloadBranchArchive(projectId: string, branchName: string): Promise<Uint8Array> {
    const ref = parseRepoRef(projectId);
    const response = await this.read(`download tarball of ${branchName}`, () =>
      this.octokit.repos.downloadTarballArchive({ ...ref, ref: branchName }),
    );
    const data: unknown = response.data;
    if (data instanceof ArrayBuffer) return new Uint8Array(data);
    if (data instanceof Uint8Array) return data;
    throw new Error(`Unexpected tarball payload for branch '${branchName}'`);
  }

  async postComment(projectId: string, requestNumber: number, body: string): Promise<void> {
    await this.octokit.issues.createComment({ ...parseRepoRef(projectId), issue_number: requestNumber, body });
  }

  async closeRequest(projectId: string, requestNumber: number): Promise<void> {
    await this.octokit.pulls.update({ ...parseRepoRef(projectId), pull_number: requestNumber, state: "closed" });
  }

  async deleteBranch(projectId: string, branchName: string): Promise<void> {
    await this.octokit.git.deleteRef({ ...parseRepoRef(projectId), ref: `heads/${branchName}` });
  }

  async listRecentComments(projectId: string, requestNumber: number, limit = 20): Promise<RawComment[]> {
    const comments = await this.listIssueComments(projectId, requestNumber);
    return comments
      .slice(-limit)
      .reverse()
      .map((comment) => ({ body: comment.body ?? "" }));
  }

  private listIssueComments(projectId: string, requestNumber: number) {
    const ref = parseRepoRef(projectId);
    return this.read(`list comments of #${requestNumber}`, () =>
      this.octokit.paginate(this.octokit.issues.listComments, { ...ref, issue_number: requestNumber, per_page: 100 }),
    );
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(label, fn, this.options.retry);
  }
}
