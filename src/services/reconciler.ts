import type { z } from 'zod';
import type { Result, ScrapeError } from '../types/paatshala.js';
import type { CacheStore } from './cache.js';

export type RefreshOutcome<T> =
  | { status: 'applied'; value: T }
  | { status: 'discarded' }
  | { status: 'failed'; error: ScrapeError };

export type UpdateListener<T> = (courseId: string, value: T) => void;

export interface ReconcilerOptions<T> {
  cache: CacheStore;
  cacheKey: (courseId: string) => string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  fetch: (courseId: string) => Promise<Result<T>>;
}

export interface OpenedCourse<T> {
  cached: T | null;
  /** When the cached value was written; null on a miss */
  cachedAt: string | null;
  /** Settles once the background refresh is applied, discarded or failed; never rejects */
  refresh: Promise<RefreshOutcome<T>>;
}

/**
 * Serve the cached value for a course straight away and refresh it in the
 * background. A refresh result is only applied (saved and announced) if its
 * course is still the current one when it lands; otherwise it is dropped.
 */
export class CourseReconciler<T> {
  private current: string | null = null;
  private readonly inFlight = new Map<string, Promise<RefreshOutcome<T>>>();
  private readonly listeners = new Set<UpdateListener<T>>();

  constructor(private readonly options: ReconcilerOptions<T>) {}

  get currentCourse(): string | null {
    return this.current;
  }

  onUpdate(listener: UpdateListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Mark a course current without refreshing it */
  select(courseId: string): void {
    this.current = courseId;
  }

  open(courseId: string): OpenedCourse<T> {
    this.select(courseId);
    const entry = this.options.cache.loadEntry(this.options.cacheKey(courseId), this.options.schema);
    return {
      cached: entry?.data ?? null,
      cachedAt: entry?.timestamp ?? null,
      refresh: this.refresh(courseId),
    };
  }

  /** Start a refresh unless one for the same course is already running */
  refresh(courseId: string): Promise<RefreshOutcome<T>> {
    const running = this.inFlight.get(courseId);
    if (running) return running;

    const task = this.run(courseId).finally(() => {
      this.inFlight.delete(courseId);
    });
    this.inFlight.set(courseId, task);
    return task;
  }

  private async run(courseId: string): Promise<RefreshOutcome<T>> {
    let result: Result<T>;
    try {
      result = await this.options.fetch(courseId);
    } catch (error) {
      result = { ok: false, error: { kind: 'network', message: error instanceof Error ? error.message : String(error) } };
    }

    if (!result.ok) {
      console.error(`[Reconciler] Refresh of course ${courseId} failed: ${result.error.message}`);
      return { status: 'failed', error: result.error };
    }
    if (this.current !== courseId) {
      return { status: 'discarded' };
    }

    this.options.cache.save(this.options.cacheKey(courseId), result.value);
    for (const listener of this.listeners) {
      try {
        listener(courseId, result.value);
      } catch (error) {
        console.error('[Reconciler] Update listener failed:', error instanceof Error ? error.message : String(error));
      }
    }
    return { status: 'applied', value: result.value };
  }
}
