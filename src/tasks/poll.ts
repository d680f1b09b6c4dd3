import { type Clock, SystemClock } from '../clock.js';
import { TaskTimeoutError } from '../errors.js';
import { debugLog } from '../log.js';

export const IN_PROGRESS_STATUSES = ['queued', 'preRunning', 'running'] as const;
export const TERMINAL_STATUSES = ['success', 'error', 'canceled', 'aborted'] as const;

export type InProgressStatus = (typeof IN_PROGRESS_STATUSES)[number];
export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];

export function isTerminalStatus(status: string): status is TerminalStatus {
  return TERMINAL_STATUSES.some((s) => s === status);
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
}

export interface PollResult<T> {
  task: T;
  status: TerminalStatus;
  /** Number of times the task was fetched. */
  polls: number;
}

export const DEFAULT_POLL_OPTIONS: Readonly<Omit<PollOptions, 'clock'>> = {
  intervalMs: 3_000,
  timeoutMs: 10 * 60_000,
};

/**
 * Fetch a task until it reaches a terminal status.
 *
 * Fetches once immediately, then every `intervalMs`. Statuses not known to be
 * terminal count as in progress. No fetch is issued at or after the deadline
 * (`start + timeoutMs`); the last sleep is shortened to end on it.
 *
 * @throws TaskTimeoutError when the deadline passes first.
 */
export async function waitForTask<T>(
  fetchTask: () => Promise<T>,
  statusOf: (task: T) => string,
  options: PollOptions,
): Promise<PollResult<T>> {
  const clock = options.clock ?? new SystemClock();
  const deadline = clock.now().getTime() + options.timeoutMs;
  let polls = 0;
  let lastStatus: string | null = null;

  for (;;) {
    const task = await fetchTask();
    polls += 1;
    const status = statusOf(task);
    lastStatus = status;
    debugLog('tasks', 'poll', { polls, status });

    if (isTerminalStatus(status)) {
      return { task, status, polls };
    }

    const remaining = deadline - clock.now().getTime();
    if (remaining <= 0) {
      throw new TaskTimeoutError(options.timeoutMs, lastStatus);
    }
    await clock.sleep(Math.min(options.intervalMs, remaining));
    if (clock.now().getTime() >= deadline) {
      throw new TaskTimeoutError(options.timeoutMs, lastStatus);
    }
  }
}
