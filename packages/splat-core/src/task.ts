import { describeError, logError } from "./logging";

/**
 * Run a task in the background. The caller never waits on it: results travel
 * back through a Deferred or a Channel that the frame loop polls.
 *
 * The task starts on the next microtask, so nothing it does can interleave
 * with the synchronous part of the current tick.
 */
export function execTask(task: () => Promise<void>, label = "task"): void {
  void Promise.resolve()
    .then(task)
    .catch((err: unknown) => {
      logError("task", `${label} failed: ${describeError(err)}`, undefined, err);
    });
}
