import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  parseMessages,
  loadMessagesFromFile,
  loadMessagePools,
  pickRandom,
  renderGreeting,
  FALLBACK_REMINDER_COMMENTS,
  FALLBACK_EMAIL_GREETINGS,
} from "./messages.js";

describe("parseMessages", () => {
  it("splits on blank lines, drops comments and joins wrapped lines", () => {
    const text = "# header\nfirst line\ncontinued\n\n\n# note\nsecond\n  \nthird";
    expect(parseMessages(text)).toEqual(["first line continued", "second", "third"]);
  });

  it("handles CRLF line endings", () => {
    expect(parseMessages("a\r\nb\r\n\r\nc\r\n")).toEqual(["a b", "c"]);
  });

  it("returns nothing for a comment-only file", () => {
    expect(parseMessages("# only\n# comments\n")).toEqual([]);
  });
});

describe("loading files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "messages-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("throws for missing and empty files", () => {
    expect(() => loadMessagesFromFile(join(dir, "missing.txt"))).toThrow("Messages file not found");
    const empty = join(dir, "empty.txt");
    writeFileSync(empty, "# nothing\n", "utf-8");
    expect(() => loadMessagesFromFile(empty)).toThrow("No valid messages found");
  });

  it("falls back to built-in pools when files are unusable", () => {
    const pools = loadMessagePools({
      mrCommentsFile: join(dir, "missing.txt"),
      emailGreetingsFile: join(dir, "missing-too.txt"),
    });
    expect(pools.reminderComments).toEqual([...FALLBACK_REMINDER_COMMENTS]);
    expect(pools.emailGreetings).toEqual([...FALLBACK_EMAIL_GREETINGS]);
  });

  it("loads configured files", () => {
    const comments = join(dir, "comments.txt");
    writeFileSync(comments, "one\n\ntwo\n", "utf-8");
    const pools = loadMessagePools({ mrCommentsFile: comments, emailGreetingsFile: join(dir, "none.txt") });
    expect(pools.reminderComments).toEqual(["one", "two"]);
  });

  it("ships non-empty default pools", () => {
    const pools = loadMessagePools();
    expect(pools.reminderComments.length).toBeGreaterThan(FALLBACK_REMINDER_COMMENTS.length);
    expect(pools.emailGreetings.every((g) => g.includes("{{ stale_days }}"))).toBe(true);
  });
});

describe("pickRandom", () => {
  it("maps the random value onto an index", () => {
    expect(pickRandom(["a", "b", "c"], () => 0)).toBe("a");
    expect(pickRandom(["a", "b", "c"], () => 0.5)).toBe("b");
    expect(pickRandom(["a", "b", "c"], () => 0.999)).toBe("c");
  });

  it("rejects an empty list", () => {
    expect(() => pickRandom([])).toThrow("empty");
  });
});

describe("renderGreeting", () => {
  it("substitutes stale_days with or without spaces", () => {
    expect(renderGreeting("idle {{ stale_days }} days, {{stale_days}}!", 30)).toBe("idle 30 days, 30!");
  });
});
