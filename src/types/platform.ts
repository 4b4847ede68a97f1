export type PlatformKind = "gitlab" | "github";

export interface RawBranch {
  name: string;
  /** Commit timestamp as returned by the API; null when missing. */
  committedDate: string | null;
  authorName: string;
  authorEmail: string;
  committerEmail: string;
}

export interface RawUser {
  username: string;
  email?: string;
  name?: string;
}

export interface RawRequest {
  number: number;
  title: string;
  url: string;
  sourceBranch: string;
  /** Repository the source branch lives in, when the host reports it. */
  sourceProject: string | null;
  /** Source branch lives in another repository than the request's target. */
  fromFork: boolean;
  assignee?: RawUser;
  author?: RawUser;
  updatedAt: string | null;
}

export interface RawComment {
  body: string;
}

/**
 * Operations the lifecycle engine needs from a source-control host.
 * GitLab merge requests and GitHub pull requests are both "requests".
 */
export interface HostingPlatform {
  readonly kind: PlatformKind;
  /** "merge request" or "pull request", for log lines and bot comments. */
  readonly requestNoun: string;
  /** "!" on GitLab, "#" on GitHub. */
  readonly requestPrefix: string;

  getProjectName(projectId: string): Promise<string>;
  listNonProtectedBranches(projectId: string): Promise<RawBranch[]>;
  listOpenRequests(projectId: string): Promise<RawRequest[]>;
  latestCommentInstant(projectId: string, requestNumber: number): Promise<string | null>;
  findOpenRequestForBranch(projectId: string, branchName: string): Promise<RawRequest | null>;
  resolveUserEmail(username: string): Promise<string | null>;
  isUserActive(email: string): Promise<boolean>;
  downloadBranchArchive(projectId: string, branchName: string): Promise<Uint8Array>;
  postComment(projectId: string, requestNumber: number, body: string): Promise<void>;
  closeRequest(projectId: string, requestNumber: number): Promise<void>;
  deleteBranch(projectId: string, branchName: string): Promise<void>;
  listRecentComments(projectId: string, requestNumber: number, limit?: number): Promise<RawComment[]>;
}
