import { Injectable } from '@nestjs/common';
import type { Feedback } from './feedback.types';

export const FEEDBACK_REPOSITORY = Symbol('FEEDBACK_REPOSITORY');

/** Append-only feedback history. */
export interface FeedbackRepository {
  append(feedback: Feedback): Promise<void>;
  /** Entries created at or before `to` (all when omitted), oldest first. */
  history(to?: Date): Promise<Feedback[]>;
}

@Injectable()
export class InMemoryFeedbackRepository implements FeedbackRepository {
  private readonly entries: Feedback[] = [];

  async append(feedback: Feedback) {
    this.entries.push(feedback);
  }

  async history(to?: Date) {
    if (!to) return [...this.entries];
    const limit = to.getTime();
    return this.entries.filter((f) => Date.parse(f.createdAt) <= limit);
  }
}
