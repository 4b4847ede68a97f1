import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { shouldNotify, recordDelivery } from "./throttle.js";
import { NotificationLedger } from "../ledger/notification-ledger.js";
import { MS_PER_DAY } from "../dates.js";
import type { RecipientItemSet, StaleBranch, StaleRequest } from "../types/index.js";

const RECIPIENT = "dev@example.com";
const NOW = new Date("2024-06-01T12:00:00Z");

function branch(name: string): StaleBranch {
  return {
    kind: "branch",
    projectId: "42",
    projectName: "app",
    branchName: name,
    lastCommitAt: new Date("2024-03-01T00:00:00Z"),
    authorName: "Dev",
    authorEmail: RECIPIENT,
    committerEmail: RECIPIENT,
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
    authorName: "Dev",
    lastActivityAt: new Date("2024-03-01T00:00:00Z"),
  };
}

function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

describe("shouldNotify", () => {
  let ledger: NotificationLedger;

  beforeEach(() => {
    ledger = NotificationLedger.inMemory();
  });

  afterEach(() => {
    ledger.close();
  });

  it("is false for an empty set", () => {
    expect(shouldNotify(ledger, RECIPIENT, { branches: [], mergeRequests: [] }, 7, NOW)).toBe(false);
  });

  it("sends, then holds, then sends again after the window", () => {
    const items: RecipientItemSet = { branches: [branch("feature-x")], mergeRequests: [] };

    expect(shouldNotify(ledger, RECIPIENT, items, 7, NOW)).toBe(true);
    recordDelivery(ledger, RECIPIENT, items, NOW);
    expect(shouldNotify(ledger, RECIPIENT, items, 7, NOW)).toBe(false);
    expect(shouldNotify(ledger, RECIPIENT, items, 7, daysAfter(NOW, 7))).toBe(false);
    expect(shouldNotify(ledger, RECIPIENT, items, 7, daysAfter(NOW, 8))).toBe(true);
  });

  it("gives the same answer when asked twice", () => {
    const items: RecipientItemSet = { branches: [branch("a")], mergeRequests: [request(1)] };
    recordDelivery(ledger, RECIPIENT, items, NOW);
    const later = daysAfter(NOW, 3);
    const first = shouldNotify(ledger, RECIPIENT, items, 7, later);
    expect(shouldNotify(ledger, RECIPIENT, items, 7, later)).toBe(first);
  });

  it("lets a new item override a recent notification", () => {
    const old: RecipientItemSet = { branches: [branch("a")], mergeRequests: [] };
    recordDelivery(ledger, RECIPIENT, old, NOW);

    const withNew: RecipientItemSet = { branches: [branch("a")], mergeRequests: [request(5)] };
    expect(shouldNotify(ledger, RECIPIENT, withNew, 7, NOW)).toBe(true);
  });

  it("uses the oldest notification across the set", () => {
    const a: RecipientItemSet = { branches: [branch("a")], mergeRequests: [] };
    const b: RecipientItemSet = { branches: [branch("b")], mergeRequests: [] };
    recordDelivery(ledger, RECIPIENT, a, NOW);
    recordDelivery(ledger, RECIPIENT, b, daysAfter(NOW, 6));

    const both: RecipientItemSet = { branches: [branch("a"), branch("b")], mergeRequests: [] };
    expect(shouldNotify(ledger, RECIPIENT, both, 7, daysAfter(NOW, 8))).toBe(true);
  });

  it("tracks recipients independently", () => {
    const items: RecipientItemSet = { branches: [branch("a")], mergeRequests: [] };
    recordDelivery(ledger, RECIPIENT, items, NOW);
    expect(shouldNotify(ledger, "ops@example.com", items, 7, NOW)).toBe(true);
  });
});

describe("recordDelivery", () => {
  it("writes one row per branch and per request", () => {
    const ledger = NotificationLedger.inMemory();
    recordDelivery(ledger, RECIPIENT, { branches: [branch("a")], mergeRequests: [request(7)] }, NOW);

    expect(ledger.lastNotifiedAt(RECIPIENT, "branch", "42", "a")).toEqual(NOW);
    expect(ledger.lastNotifiedAt(RECIPIENT, "merge_request", "42", "7")).toEqual(NOW);
    expect(ledger.lastNotifiedAt(RECIPIENT, "branch", "42", "mr-7")).toBeNull();
    ledger.close();
  });
});
