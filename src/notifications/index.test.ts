import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { notifyRecipients, type NotifyOptions } from "./index.js";
import type { EmailSender } from "./email.js";
import { NotificationLedger } from "../ledger/notification-ledger.js";
import { createMockPlatform } from "../e2e/helpers/mock-platform.js";
import type { ProjectAttribution, RecipientItemSet, StaleBranch, StaleRequest } from "../types/index.js";

vi.mock("../log.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../log.js")>();
  return { ...actual, info: vi.fn(), heading: vi.fn(), dryRun: vi.fn(), debug: vi.fn() };
});

const NOW = new Date("2024-06-01T12:00:00Z");

function branch(name: string): StaleBranch {
  return {
    kind: "branch",
    projectId: "42",
    projectName: "app",
    branchName: name,
    lastCommitAt: new Date("2024-03-01T00:00:00Z"),
    authorName: "Dev",
    authorEmail: "dev@example.com",
    committerEmail: "dev@example.com",
  };
}

function request(number: number): StaleRequest {
  return {
    kind: "request",
    projectId: "42",
    projectName: "app",
    number,
    title: `Change ${number}`,
    webUrl: `https://git.example.com/${number}`,
    sourceBranch: `mr-${number}`,
    fromFork: false,
    authorName: "Ann Author",
    lastActivityAt: new Date("2024-03-01T00:00:00Z"),
  };
}

function attribution(entries: Array<[string, RecipientItemSet]>, dropped: StaleBranch[] = []): ProjectAttribution {
  return { byRecipient: new Map(entries), dropped };
}

const options: NotifyOptions = {
  staleDays: 30,
  cleanupWeeks: 4,
  frequencyDays: 7,
  dryRun: false,
  greetings: ["Idle for {{ stale_days }} days."],
  now: NOW,
};

describe("notifyRecipients", () => {
  let ledger: NotificationLedger;
  const platform = createMockPlatform({ projects: {} });
  const send = vi.fn<EmailSender["send"]>();
  const sender: EmailSender = { send };

  beforeEach(() => {
    ledger = NotificationLedger.inMemory();
    send.mockReset();
  });

  afterEach(() => {
    ledger.close();
  });

  it("sends one email per recipient and records the delivery", async () => {
    send.mockResolvedValue(true);
    const items: RecipientItemSet = { branches: [branch("old")], mergeRequests: [request(7)] };

    const summary = await notifyRecipients(
      platform,
      ledger,
      attribution([["dev@example.com", items]], [branch("orphan")]),
      sender,
      options,
    );

    expect(send).toHaveBeenCalledTimes(1);
    const [to, subject, html] = send.mock.calls[0];
    expect(to).toBe("dev@example.com");
    expect(subject).toBe("[Action Required] 2 Stale Item(s) Require Attention");
    expect(html).toContain("<p>Idle for 30 days.</p>");
    expect(summary).toEqual({
      totalStaleBranches: 1,
      totalStaleRequests: 1,
      emailsSent: 1,
      emailsSkipped: 0,
      emailsFailed: 0,
      itemsDropped: 1,
      recipients: ["dev@example.com"],
    });
    expect(ledger.lastNotifiedAt("dev@example.com", "branch", "42", "old")).toEqual(NOW);
    expect(ledger.lastNotifiedAt("dev@example.com", "merge_request", "42", "7")).toEqual(NOW);
  });

  it("skips recipients notified inside the window", async () => {
    send.mockResolvedValue(true);
    const items: RecipientItemSet = { branches: [branch("old")], mergeRequests: [] };
    ledger.recordNotification("dev@example.com", "branch", "42", "old", new Date("2024-05-30T00:00:00Z"));

    const summary = await notifyRecipients(platform, ledger, attribution([["dev@example.com", items]]), sender, options);

    expect(send).not.toHaveBeenCalled();
    expect(summary.emailsSkipped).toBe(1);
    expect(summary.totalStaleBranches).toBe(1);
  });

  it("leaves the ledger alone when delivery fails", async () => {
    send.mockResolvedValue(false);
    const items: RecipientItemSet = { branches: [branch("old")], mergeRequests: [] };

    const summary = await notifyRecipients(platform, ledger, attribution([["dev@example.com", items]]), sender, options);

    expect(summary.emailsFailed).toBe(1);
    expect(summary.emailsSent).toBe(0);
    expect(ledger.lastNotifiedAt("dev@example.com", "branch", "42", "old")).toBeNull();
  });

  it("counts dry runs as sent without sending or recording", async () => {
    const items: RecipientItemSet = { branches: [branch("old")], mergeRequests: [] };

    const summary = await notifyRecipients(platform, ledger, attribution([["dev@example.com", items]]), sender, {
      ...options,
      dryRun: true,
    });

    expect(send).not.toHaveBeenCalled();
    expect(summary.emailsSent).toBe(1);
    expect(summary.recipients).toEqual(["dev@example.com"]);
    expect(ledger.lastNotifiedAt("dev@example.com", "branch", "42", "old")).toBeNull();
  });
});
