import { z } from 'zod';
import { loadConfig, type PaatshalaConfig } from './config.js';
import type { PaatshalaClient } from './paatshala-client.js';
import { CacheStore, cacheKeys } from './services/cache.js';
import { CourseReconciler } from './services/reconciler.js';
import { fetchTopics } from './services/scraper.js';
import { SessionManager, deriveSesskey } from './services/session.js';
import { TopicsState } from './services/topics-state.js';
import type { Result, Topic } from './types/paatshala.js';
import { topicSchema } from './types/schemas.js';

/**
 * Everything the tools share for one server process: configuration, the
 * session, the disk cache and per-course topic state.
 */
export class AppContext {
  readonly cache: CacheStore;
  readonly topics: CourseReconciler<Topic[]>;
  private readonly topicStates = new Map<string, TopicsState>();

  constructor(readonly config: PaatshalaConfig, readonly session: SessionManager) {
    this.cache = new CacheStore(config.outputDir);
    this.topics = new CourseReconciler<Topic[]>({
      cache: this.cache,
      cacheKey: cacheKeys.topics,
      schema: z.array(topicSchema),
      fetch: async courseId => fetchTopics(await this.session.getClient(), courseId),
    });
    // A refresh that lands replaces the in-memory list as well
    this.topics.onUpdate((courseId, value) => {
      this.topicStates.get(courseId)?.update(value);
    });
  }

  client(): Promise<PaatshalaClient> {
    return this.session.getClient();
  }

  /** In-memory topic list for a course, seeded from the cache; edits schedule a refresh */
  topicState(courseId: string): TopicsState {
    let state = this.topicStates.get(courseId);
    if (!state) {
      state = TopicsState.fromCache(this.cache, courseId);
      this.topicStates.set(courseId, state);
    }
    return state;
  }

  /** Kick off a background topic refresh; failures are only logged */
  scheduleTopicRefresh(courseId: string): void {
    this.topics.refresh(courseId).catch((err) => {
      console.error(`[Context] Topic refresh for course ${courseId} failed:`, err instanceof Error ? err.message : String(err));
    });
  }

  /** Topics for a course: the in-memory list when loaded, otherwise a live fetch */
  async loadTopics(courseId: string): Promise<Topic[]> {
    this.topics.select(courseId);
    const state = this.topicState(courseId);
    if (state.get().length > 0) return [...state.get()];
    const topics = unwrap(await fetchTopics(await this.client(), courseId));
    state.update(topics);
    return topics;
  }

  /** Fresh sesskey for a batch of edits on a course */
  async sesskey(client: PaatshalaClient, courseId: string): Promise<string> {
    const key = await deriveSesskey(client, courseId);
    if (!key) throw new Error(`Could not obtain a sesskey for course ${courseId}; check that you can edit this course`);
    return key;
  }
}

/** Throw a Result's error so tool handlers can report it through formatError */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw new Error(result.error.message);
}

let contextInstance: AppContext | null = null;

export function getAppContext(): AppContext {
  if (!contextInstance) {
    const config = loadConfig();
    contextInstance = new AppContext(config, new SessionManager(config));
  }
  return contextInstance;
}
