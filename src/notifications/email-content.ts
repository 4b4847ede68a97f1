import { formatDisplay } from "../dates.js";
import type { RecipientItemSet, StaleBranch, StaleRequest } from "../types/index.js";

export interface EmailContext {
  staleDays: number;
  cleanupWeeks: number;
  /** Already rendered, e.g. by `renderGreeting`. */
  greeting: string;
  /** "merge request" or "pull request". */
  requestNoun: string;
  requestPrefix: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function titleCase(noun: string): string {
  return noun
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function buildEmailSubject(items: RecipientItemSet, requestNoun = "merge request"): string {
  const requests = items.mergeRequests.length;
  const branches = items.branches.length;

  if (requests > 0 && branches > 0) {
    return `[Action Required] ${requests + branches} Stale Item(s) Require Attention`;
  }
  if (requests > 0) {
    return `[Action Required] ${requests} Stale ${titleCase(requestNoun)}(s) Require Attention`;
  }
  return `[Action Required] ${branches} Stale Branch(es) Require Attention`;
}

function requestEntry(request: StaleRequest, prefix: string): string {
  return `
            <div class="mr-item">
                <strong>${escapeHtml(request.projectName)}</strong>: <a href="${escapeHtml(request.webUrl)}">${escapeHtml(prefix)}${request.number} - ${escapeHtml(request.title)}</a>
                <br>
                <small>Source branch: <code>${escapeHtml(request.sourceBranch)}</code></small>
                <br>
                <small>Last updated: ${formatDisplay(request.lastActivityAt)} by ${escapeHtml(request.authorName)}</small>
            </div>`;
}

function branchEntry(branch: StaleBranch): string {
  return `
            <div class="branch-item">
                <strong>${escapeHtml(branch.projectName)}</strong>: <code>${escapeHtml(branch.branchName)}</code>
                <br>
                <small>Last commit: ${formatDisplay(branch.lastCommitAt)} by ${escapeHtml(branch.authorName)}</small>
            </div>`;
}

function section(heading: string, entries: string[]): string {
  if (entries.length === 0) return "";
  return `
        <div class="branch-list">
            <h3>${heading}:</h3>${entries.join("")}
        </div>`;
}

/** One HTML body per recipient. Every interpolated value is escaped. */
export function renderEmailHtml(items: RecipientItemSet, context: EmailContext): string {
  const requestSection = section(
    `Stale ${titleCase(context.requestNoun)}s`,
    items.mergeRequests.map((r) => requestEntry(r, context.requestPrefix)),
  );
  const branchSection = section("Stale Branches", items.branches.map(branchEntry));

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <style>
        body { font-family: Arial, sans-serif; line-height: 1.6; }
        .header { background-color: #fc6d26; color: white; padding: 20px; }
        .content { padding: 20px; }
        .branch-list { background-color: #f5f5f5; padding: 15px; margin: 10px 0; }
        .warning { color: #d93025; font-weight: bold; }
        .branch-item { margin: 5px 0; }
        .mr-item { margin: 5px 0; background-color: #e8f4e8; padding: 10px; }
    </style>
</head>
<body>
    <div class="header">
        <h1>Branch Cleanup Notification</h1>
    </div>
    <div class="content">
        <p>Hello,</p>

        <p>${escapeHtml(context.greeting)}</p>
${requestSection}${branchSection}

        <p><strong>Action Required:</strong> Please review these items and either:</p>
        <ul>
            <li>Merge them if the work is complete</li>
            <li>Update them with new commits if work is ongoing</li>
            <li>Close/Delete them if they are no longer needed</li>
        </ul>

        <p class="warning">⚠️ Important: Items that remain inactive will be automatically
        cleaned up after ${context.cleanupWeeks} weeks from this notification.</p>

        <p>Stale items are those without activity for ${context.staleDays} days.
        If you have any questions, please contact the repository maintainers.</p>

        <p>Best regards,<br>Repository Maintenance Team</p>
    </div>
</body>
</html>
`;
}
