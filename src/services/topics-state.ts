import { z } from 'zod';
import type { Topic } from '../types/paatshala.js';
import { topicSchema } from '../types/schemas.js';
import { cacheKeys, type CacheStore } from './cache.js';

const topicListSchema = z.array(topicSchema);

/**
 * The topic list of one course as the tools see it. Every change is written
 * through to the cache; `onChange` lets the owner schedule a live refresh.
 * Structural edits renumber `sectionNumber` so it keeps matching page order.
 */
export class TopicsState {
  private topics: Topic[];

  constructor(
    private readonly cache: CacheStore,
    readonly courseId: string,
    initial: Topic[] = [],
    private readonly onChange?: (courseId: string) => void,
  ) {
    this.topics = [...initial];
  }

  static fromCache(cache: CacheStore, courseId: string, onChange?: (courseId: string) => void): TopicsState {
    const cached = cache.load(cacheKeys.topics(courseId), topicListSchema);
    return new TopicsState(cache, courseId, cached ?? [], onChange);
  }

  get(): readonly Topic[] {
    return this.topics;
  }

  at(index: number): Topic | undefined {
    return this.topics[index];
  }

  /** Replace the whole list */
  update(topics: Topic[]): void {
    this.topics = [...topics];
    this.persist();
  }

  updateAt(index: number, patch: Partial<Omit<Topic, 'sectionNumber'>>): boolean {
    const topic = this.topics[index];
    if (!topic) return false;
    const next = { ...topic, ...patch };
    if (patch.activities) next.activityCount = patch.activities.length;
    this.topics[index] = next;
    this.persist();
    return true;
  }

  removeAt(index: number): Topic | null {
    if (index < 0 || index >= this.topics.length) return null;
    const start = this.firstNumber();
    const [removed] = this.topics.splice(index, 1);
    this.renumber(start);
    this.persist();
    return removed;
  }

  insertAt(index: number, topic: Topic): void {
    const start = this.topics.length > 0 ? this.firstNumber() : topic.sectionNumber;
    const position = Math.max(0, Math.min(index, this.topics.length));
    this.topics.splice(position, 0, topic);
    this.renumber(start);
    this.persist();
  }

  move(from: number, to: number): boolean {
    if (from < 0 || from >= this.topics.length || to < 0 || to >= this.topics.length) return false;
    if (from === to) return true;
    const start = this.firstNumber();
    const [moved] = this.topics.splice(from, 1);
    this.topics.splice(to, 0, moved);
    this.renumber(start);
    this.persist();
    return true;
  }

  private firstNumber(): number {
    return this.topics.length > 0 ? Math.min(...this.topics.map(topic => topic.sectionNumber)) : 0;
  }

  private renumber(start: number): void {
    this.topics = this.topics.map((topic, i) => ({ ...topic, sectionNumber: start + i }));
  }

  private persist(): void {
    this.cache.save(cacheKeys.topics(this.courseId), this.topics);
    this.onChange?.(this.courseId);
  }
}
