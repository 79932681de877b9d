/**
 * Frontier
 * Deduplicated work queue of crawl tasks with per-host FIFO order.
 *
 * Every mutation is a synchronous method, so a dequeue is an atomic claim
 * even with many async workers sharing one instance. Tasks live in an arena
 * and are addressed by handle; the visited set holds every normalized URL
 * ever enqueued (or seeded from a previous run) so no URL is fetched twice.
 */

import { isAllowedHost, extractHost, normalizeUrl } from './url-normalizer';
import {
  EnqueueOutcome,
  EnqueueResult,
  FrontierConfig,
  FrontierSnapshot,
  HostScheduler,
  NewTask,
  PendingTaskState,
  StopReason,
  TaskHandle,
  TaskStatus,
  UrlTask,
} from './crawling.types';

interface TaskRecord {
  task: UrlTask;
  status: TaskStatus;
}

export class Frontier {
  private records: TaskRecord[] = [];
  private visited: Set<string> = new Set();
  private completed: Set<string> = new Set();
  private hostQueues: Map<string, TaskHandle[]> = new Map();
  private pendingCount: number = 0;
  private inFlight: number = 0;
  private dispatched: number = 0;
  private stopReason: StopReason | null = null;
  private waiters: Array<() => void> = [];

  constructor(
    private readonly config: FrontierConfig,
    private readonly scheduler?: HostScheduler
  ) {
    if (config.depthLimit < 0 || config.maxPages < 0) {
      throw new RangeError('depthLimit and maxPages must not be negative');
    }
  }

  /**
   * Mark URLs as already processed by an earlier run.
   * Returns how many were new to the visited set.
   */
  seedVisited(urls: Iterable<string>): number {
    let added = 0;
    for (const url of urls) {
      const normalized = normalizeUrl(url);
      if (!normalized) continue;
      this.completed.add(normalized);
      if (!this.visited.has(normalized)) {
        this.visited.add(normalized);
        added++;
      }
    }
    return added;
  }

  /**
   * Add a task unless its URL was seen before or it breaks depth or host limits.
   * Accepted after a stop as well, so discoveries survive into the saved state.
   */
  enqueue(newTask: NewTask): EnqueueResult {
    const url = normalizeUrl(newTask.url);
    if (!url) {
      return { outcome: EnqueueOutcome.INVALID_URL };
    }
    if (newTask.depth > this.config.depthLimit) {
      return { outcome: EnqueueOutcome.DEPTH_EXCEEDED, url };
    }
    if (!isAllowedHost(url, this.config.allowedHosts)) {
      return { outcome: EnqueueOutcome.HOST_NOT_ALLOWED, url };
    }
    if (this.visited.has(url)) {
      return { outcome: EnqueueOutcome.DUPLICATE, url };
    }

    const handle = this.records.length;
    const task: UrlTask = {
      handle,
      url,
      host: extractHost(url),
      depth: newTask.depth,
      kind: newTask.kind,
      parentUrl: newTask.parentUrl,
      discoveredAt: new Date(),
    };
    this.records.push({ task, status: TaskStatus.PENDING });
    this.visited.add(url);

    const queue = this.hostQueues.get(task.host) ?? [];
    queue.push(handle);
    this.hostQueues.set(task.host, queue);
    this.pendingCount++;

    this.notify();
    return { outcome: EnqueueOutcome.QUEUED, handle, url };
  }

  /**
   * Claim the next task, or null when none may start now.
   * Picks the host the scheduler can admit soonest; FIFO within a host.
   */
  dequeue(): UrlTask | null {
    if (this.stopReason !== null || this.pendingCount === 0) {
      return null;
    }
    if (this.dispatched >= this.config.maxPages) {
      this.stop(StopReason.MAX_PAGES);
      return null;
    }

    let chosen: TaskHandle[] | null = null;
    let chosenWait = Number.POSITIVE_INFINITY;
    for (const [host, queue] of this.hostQueues) {
      if (queue.length === 0) continue;
      const wait = this.scheduler ? this.scheduler.estimateWait(host) : 0;
      if (
        chosen === null ||
        wait < chosenWait ||
        (wait === chosenWait && queue[0] < chosen[0])
      ) {
        chosen = queue;
        chosenWait = wait;
      }
    }

    const handle = chosen?.shift();
    if (handle === undefined) {
      return null;
    }

    const record = this.records[handle];
    record.status = TaskStatus.IN_FLIGHT;
    this.pendingCount--;
    this.inFlight++;
    this.dispatched++;

    if (this.dispatched >= this.config.maxPages) {
      this.stop(StopReason.MAX_PAGES);
    }
    return record.task;
  }

  /**
   * Finish a claimed task
   */
  complete(handle: TaskHandle, status: TaskStatus.SUCCEEDED | TaskStatus.FAILED | TaskStatus.SKIPPED): void {
    const record = this.getInFlightRecord(handle);
    record.status = status;
    this.inFlight--;
    if (status === TaskStatus.SUCCEEDED) {
      this.completed.add(record.task.url);
    }
    this.notify();
  }

  /**
   * Return a claimed task that never started fetching to the head of its host queue
   */
  requeue(handle: TaskHandle): void {
    const record = this.getInFlightRecord(handle);
    record.status = TaskStatus.PENDING;
    this.inFlight--;
    this.dispatched--;
    this.pendingCount++;

    const queue = this.hostQueues.get(record.task.host) ?? [];
    queue.unshift(handle);
    this.hostQueues.set(record.task.host, queue);
    this.notify();
  }

  /**
   * Stop handing out tasks. In-flight tasks may still complete.
   */
  stop(reason: StopReason = StopReason.OPERATOR): void {
    if (this.stopReason !== null) return;
    this.stopReason = reason;
    this.notify();
  }

  isStopped(): boolean {
    return this.stopReason !== null;
  }

  getStopReason(): StopReason | null {
    return this.stopReason;
  }

  /**
   * True once no task is in flight and no further task can be dispatched
   */
  isFinished(): boolean {
    if (this.inFlight > 0) return false;
    return (
      this.stopReason !== null ||
      this.pendingCount === 0 ||
      this.dispatched >= this.config.maxPages
    );
  }

  /**
   * Resolves on the next enqueue, completion, requeue or stop
   */
  waitForChange(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  hasVisited(url: string): boolean {
    const normalized = normalizeUrl(url);
    return normalized !== null && this.visited.has(normalized);
  }

  size(): number {
    return this.pendingCount;
  }

  inFlightCount(): number {
    return this.inFlight;
  }

  dispatchedCount(): number {
    return this.dispatched;
  }

  /**
   * Completed URLs and unfinished tasks, for resuming in a later run.
   * In-flight tasks are saved as pending.
   */
  snapshot(): FrontierSnapshot {
    const pending: PendingTaskState[] = this.records
      .filter((record) => record.status === TaskStatus.PENDING || record.status === TaskStatus.IN_FLIGHT)
      .map(({ task }) => ({
        url: task.url,
        depth: task.depth,
        kind: task.kind,
        ...(task.parentUrl ? { parentUrl: task.parentUrl } : {}),
      }));

    return {
      version: 1,
      savedAt: new Date().toISOString(),
      completed: Array.from(this.completed).sort(),
      pending,
    };
  }

  /**
   * Load a snapshot: completed URLs become visited, pending tasks are re-enqueued
   */
  restore(snapshot: FrontierSnapshot): { completed: number; pending: number } {
    const completed = this.seedVisited(snapshot.completed);
    let pending = 0;
    for (const task of snapshot.pending) {
      if (this.enqueue(task).outcome === EnqueueOutcome.QUEUED) {
        pending++;
      }
    }
    return { completed, pending };
  }

  private getInFlightRecord(handle: TaskHandle): TaskRecord {
    const record = this.records[handle];
    if (!record || record.status !== TaskStatus.IN_FLIGHT) {
      throw new Error(`Task ${handle} is not in flight`);
    }
    return record;
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
