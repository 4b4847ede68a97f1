import * as log from "./log.js";

const DEFAULT_MAX_WORKERS = 4;
const MIN_WORKERS = 1;
const MAX_WORKERS = 32;

export { DEFAULT_MAX_WORKERS, MIN_WORKERS, MAX_WORKERS };

export async function runConcurrent<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const i = nextIndex++;
      results[i] = await fn(items[i]);
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(concurrency, 1), items.length) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}

export interface ProjectOutcome<R> {
  projectId: string;
  result: R;
}

/**
 * Runs `fn` once per project on a bounded pool and waits for all of them.
 * A project whose task throws is logged and left out of the returned list.
 */
export async function fanOutProjects<R>(
  projectIds: string[],
  maxWorkers: number,
  label: string,
  fn: (projectId: string) => Promise<R>,
): Promise<ProjectOutcome<R>[]> {
  const settled = await runConcurrent(projectIds, maxWorkers, async (projectId) => {
    try {
      return { projectId, ok: true as const, result: await fn(projectId) };
    } catch (err: unknown) {
      log.error(`${label} failed for project ${projectId}: ${log.errorMessage(err)}`);
      return { projectId, ok: false as const };
    }
  });

  const outcomes: ProjectOutcome<R>[] = [];
  for (const s of settled) {
    if (s.ok) outcomes.push({ projectId: s.projectId, result: s.result });
  }
  return outcomes;
}
