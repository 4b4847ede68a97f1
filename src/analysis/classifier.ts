import picomatch from "picomatch";
import { daysBefore, latest, parseInstant } from "../dates.js";
import {
  describeItem,
  emptyItemSet,
  type HostingPlatform,
  type ProjectAttribution,
  type ProjectScan,
  type RawRequest,
  type RecipientItemSet,
  type StaleBranch,
  type StaleItem,
  type StaleRequest,
} from "../types/index.js";
import * as log from "../log.js";

export interface ScanOptions {
  /** Glob patterns (picomatch) for branches that are never reported. */
  ignoreBranches?: string[];
}

function branchFilter(patterns: string[]): (name: string) => boolean {
  if (patterns.length === 0) return () => false;
  const matchers = patterns.map((p) => picomatch(p, { dot: true }));
  return (name) => matchers.some((m) => m(name));
}

/**
 * Newest of the request's own update time and its most recent comment.
 * A comment lookup failure only loses that half of the answer.
 */
export async function requestLastActivity(
  platform: HostingPlatform,
  projectId: string,
  raw: RawRequest,
): Promise<Date | null> {
  let commentInstant: string | null = null;
  try {
    commentInstant = await platform.latestCommentInstant(projectId, raw.number);
  } catch (err: unknown) {
    log.debug(
      `Could not read comments for ${platform.requestPrefix}${raw.number} in project ${projectId}: ${log.errorMessage(err)}`,
    );
  }
  return latest(parseInstant(raw.updatedAt), parseInstant(commentInstant));
}

function toStaleRequest(
  projectId: string,
  projectName: string,
  raw: RawRequest,
  lastActivityAt: Date,
): StaleRequest {
  return {
    kind: "request",
    projectId,
    projectName,
    number: raw.number,
    title: raw.title,
    webUrl: raw.url,
    sourceBranch: raw.sourceBranch,
    fromFork: raw.fromFork,
    assigneeEmail: raw.assignee?.email || undefined,
    assigneeUsername: raw.assignee?.username || undefined,
    authorEmail: raw.author?.email || undefined,
    authorUsername: raw.author?.username || undefined,
    authorName: raw.author?.name || raw.author?.username || "Unknown",
    lastActivityAt,
  };
}

/**
 * Open requests with no activity since `now - staleDays`. Requests whose
 * activity time cannot be determined are left out.
 */
export async function listStaleRequests(
  platform: HostingPlatform,
  projectId: string,
  projectName: string,
  staleDays: number,
  now: Date = new Date(),
  options: ScanOptions = {},
): Promise<StaleRequest[]> {
  const cutoff = daysBefore(now, staleDays);
  const ignored = branchFilter(options.ignoreBranches ?? []);
  const stale: StaleRequest[] = [];

  for (const raw of await platform.listOpenRequests(projectId)) {
    if (ignored(raw.sourceBranch)) {
      log.debug(`Ignoring ${platform.requestPrefix}${raw.number}: branch '${raw.sourceBranch}' is in ignore_branches`);
      continue;
    }

    const lastActivity = await requestLastActivity(platform, projectId, raw);
    if (!lastActivity) {
      log.debug(
        `Could not determine last activity for ${platform.requestPrefix}${raw.number} in '${projectName}', skipping`,
      );
      continue;
    }
    if (lastActivity < cutoff) {
      stale.push(toStaleRequest(projectId, projectName, raw, lastActivity));
    }
  }

  return stale;
}

/**
 * Stale requests and bare stale branches for one project.
 *
 * A stale request claims its source branch, unless that branch lives in a
 * fork: a same-named branch here is unrelated. A stale branch that is not
 * claimed but still has an open (active) request is suppressed, since the
 * request is what people are working on. If that lookup fails the branch is
 * left out of this run rather than reported as bare.
 */
export async function scanProject(
  platform: HostingPlatform,
  projectId: string,
  staleDays: number,
  now: Date = new Date(),
  options: ScanOptions = {},
): Promise<ProjectScan> {
  const projectName = await platform.getProjectName(projectId);
  const cutoff = daysBefore(now, staleDays);
  const ignored = branchFilter(options.ignoreBranches ?? []);

  const staleRequests = await listStaleRequests(platform, projectId, projectName, staleDays, now, options);
  const claimed = new Set(staleRequests.filter((r) => !r.fromFork).map((r) => r.sourceBranch));

  const staleBranches: StaleBranch[] = [];
  for (const branch of await platform.listNonProtectedBranches(projectId)) {
    if (ignored(branch.name)) {
      log.debug(`Ignoring branch '${branch.name}': matches ignore_branches`);
      continue;
    }

    const lastCommitAt = parseInstant(branch.committedDate);
    if (!lastCommitAt) {
      log.warn(`Could not parse commit date for branch '${branch.name}' in '${projectName}', skipping`);
      continue;
    }
    if (lastCommitAt >= cutoff) continue;

    if (claimed.has(branch.name)) {
      log.debug(`Skipping branch '${branch.name}': already covered by a stale ${platform.requestNoun}`);
      continue;
    }

    let openRequest: RawRequest | null;
    try {
      openRequest = await platform.findOpenRequestForBranch(projectId, branch.name);
    } catch (err: unknown) {
      log.warn(
        `Could not check open ${platform.requestNoun}s for branch '${branch.name}' in '${projectName}', skipping: ${log.errorMessage(err)}`,
      );
      continue;
    }
    if (openRequest) {
      log.debug(
        `Skipping branch '${branch.name}': has active ${platform.requestNoun} ${platform.requestPrefix}${openRequest.number}`,
      );
      continue;
    }

    staleBranches.push({
      kind: "branch",
      projectId,
      projectName,
      branchName: branch.name,
      lastCommitAt,
      authorName: branch.authorName || "Unknown",
      authorEmail: branch.authorEmail,
      committerEmail: branch.committerEmail,
    });
  }

  log.debug(
    `Project '${projectName}': ${staleRequests.length} stale ${platform.requestNoun}(s), ${staleBranches.length} stale branch(es)`,
  );
  return { projectId, projectName, staleRequests, staleBranches };
}

/**
 * Picks the human to email about each stale item. Lookups are memoised for
 * the lifetime of the resolver and never throw: an unknown user is treated
 * as inactive.
 */
export class RecipientResolver {
  private readonly activeCache = new Map<string, Promise<boolean>>();
  private readonly emailCache = new Map<string, Promise<string | null>>();
  private readonly fallbackEmail: string | null;

  constructor(
    private readonly platform: HostingPlatform,
    fallbackEmail?: string | null,
  ) {
    this.fallbackEmail = fallbackEmail?.trim() || null;
  }

  isActive(email: string): Promise<boolean> {
    const key = email.toLowerCase();
    let pending = this.activeCache.get(key);
    if (!pending) {
      pending = this.platform.isUserActive(email).catch((err: unknown) => {
        log.warn(`Error checking user status for ${email}: ${log.errorMessage(err)}`);
        return false;
      });
      this.activeCache.set(key, pending);
    }
    return pending;
  }

  emailForUsername(username: string): Promise<string | null> {
    let pending = this.emailCache.get(username);
    if (!pending) {
      pending = this.platform.resolveUserEmail(username).catch((err: unknown) => {
        log.warn(`Error fetching user email for ${username}: ${log.errorMessage(err)}`);
        return null;
      });
      this.emailCache.set(username, pending);
    }
    return pending;
  }

  /** Assignee, then author, then the fallback; each person only if active. */
  async forRequest(request: StaleRequest): Promise<string | null> {
    const assignee = await this.personEmail(request.assigneeEmail, request.assigneeUsername);
    if (assignee && (await this.isActive(assignee))) return assignee;
    if (assignee) log.debug(`Assignee ${assignee} is not active, trying author`);

    const author = await this.personEmail(request.authorEmail, request.authorUsername);
    if (author && (await this.isActive(author))) return author;
    if (author) log.debug(`Author ${author} is not active, using fallback email`);

    return this.fallbackEmail;
  }

  /** Committer (author when the committer email is blank) if active, else the fallback. */
  async forBranch(branch: StaleBranch): Promise<string | null> {
    const email = branch.committerEmail.trim() || branch.authorEmail.trim();
    if (email && (await this.isActive(email))) return email;
    if (email) log.debug(`User ${email} is not active, using fallback email`);
    return this.fallbackEmail;
  }

  private async personEmail(email: string | undefined, username: string | undefined): Promise<string | null> {
    if (email?.trim()) return email.trim();
    if (username) return this.emailForUsername(username);
    return null;
  }
}

function addItem(map: Map<string, RecipientItemSet>, recipient: string, item: StaleItem): void {
  let set = map.get(recipient);
  if (!set) {
    set = emptyItemSet();
    map.set(recipient, set);
  }
  switch (item.kind) {
    case "branch":
      set.branches.push(item);
      break;
    case "request":
      set.mergeRequests.push(item);
      break;
  }
}

/** Attach each scanned item to exactly one recipient, requests first. */
export async function attributeScan(
  scan: ProjectScan,
  resolver: RecipientResolver,
  requestPrefix = "!",
): Promise<ProjectAttribution> {
  const byRecipient = new Map<string, RecipientItemSet>();
  const dropped: StaleItem[] = [];

  const items: StaleItem[] = [...scan.staleRequests, ...scan.staleBranches];
  for (const item of items) {
    const recipient = item.kind === "request" ? await resolver.forRequest(item) : await resolver.forBranch(item);
    if (recipient) {
      addItem(byRecipient, recipient, item);
    } else {
      dropped.push(item);
      log.warn(
        `No notification email available for ${describeItem(item, requestPrefix)}. Configure 'fallback_email' to avoid missing notifications.`,
      );
    }
  }

  return { byRecipient, dropped };
}

/** Union of per-project attributions; item lists are concatenated in input order. */
export function mergeAttributions(parts: ProjectAttribution[]): ProjectAttribution {
  const byRecipient = new Map<string, RecipientItemSet>();
  const dropped: StaleItem[] = [];
  for (const part of parts) {
    for (const [recipient, set] of part.byRecipient) {
      const target = byRecipient.get(recipient) ?? emptyItemSet();
      target.branches.push(...set.branches);
      target.mergeRequests.push(...set.mergeRequests);
      byRecipient.set(recipient, target);
    }
    dropped.push(...part.dropped);
  }
  return { byRecipient, dropped };
}
