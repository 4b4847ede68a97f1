import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import * as log from "./log.js";

export const DEFAULT_MR_COMMENTS_FILE = fileURLToPath(new URL("../data/mr_reminder_comments.txt", import.meta.url));
export const DEFAULT_EMAIL_GREETINGS_FILE = fileURLToPath(new URL("../data/email_greetings.txt", import.meta.url));

export const FALLBACK_REMINDER_COMMENTS: readonly string[] = [
  "👋 This request has been idle for a while. Does it still need attention?",
  "🧹 Friendly reminder from the cleanup bot: please merge, update or close this request.",
  "⏳ No recent activity here. A quick update would help everyone know where it stands.",
];

export const FALLBACK_EMAIL_GREETINGS: readonly string[] = [
  "The cleanup bot 🤖 found items with no activity for {{ stale_days }} days:",
  "These items have been idle for {{ stale_days }} days and could use a check-in:",
];

/** Reminder-comment and greeting pools, loaded once per run and passed down. */
export interface MessagePools {
  reminderComments: string[];
  emailGreetings: string[];
}

/**
 * Blank lines separate messages, lines starting with "#" are ignored and
 * the remaining lines of one message are joined with a single space.
 */
export function parseMessages(text: string): string[] {
  const messages: string[] = [];
  let current: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped.startsWith("#")) continue;
    if (stripped === "") {
      if (current.length > 0) {
        messages.push(current.join(" "));
        current = [];
      }
    } else {
      current.push(stripped);
    }
  }
  if (current.length > 0) messages.push(current.join(" "));

  return messages;
}

export function loadMessagesFromFile(filePath: string): string[] {
  if (!existsSync(filePath)) {
    throw new Error(`Messages file not found: ${filePath}`);
  }
  const messages = parseMessages(readFileSync(filePath, "utf-8"));
  if (messages.length === 0) {
    throw new Error(`No valid messages found in file: ${filePath}`);
  }
  return messages;
}

function loadPool(label: string, filePath: string, fallback: readonly string[]): string[] {
  try {
    const messages = loadMessagesFromFile(filePath);
    log.debug(`Loaded ${messages.length} ${label} from ${filePath}`);
    return messages;
  } catch (err: unknown) {
    log.warn(`Could not load ${label}: ${log.errorMessage(err)}. Using built-in ${label}.`);
    return [...fallback];
  }
}

export function loadMessagePools(files: { mrCommentsFile?: string; emailGreetingsFile?: string } = {}): MessagePools {
  return {
    reminderComments: loadPool(
      "reminder comments",
      files.mrCommentsFile ?? DEFAULT_MR_COMMENTS_FILE,
      FALLBACK_REMINDER_COMMENTS,
    ),
    emailGreetings: loadPool(
      "email greetings",
      files.emailGreetingsFile ?? DEFAULT_EMAIL_GREETINGS_FILE,
      FALLBACK_EMAIL_GREETINGS,
    ),
  };
}

export function pickRandom<T>(items: readonly T[], random: () => number = Math.random): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[Math.floor(random() * items.length) % items.length];
}

export function renderGreeting(template: string, staleDays: number): string {
  return template.replace(/\{\{\s*stale_days\s*\}\}/g, String(staleDays));
}
