import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { FEEDBACK_REPOSITORY, type FeedbackRepository } from './feedback.repository';
import type {
  ExportFormat,
  Feedback,
  FeedbackKind,
  FeedbackStats,
  GroupBy,
  KindCounts,
  TimeWindow,
  TurnReference,
} from './feedback.types';
import { toFeedback, type ReactionEvent } from './reaction-adapter';

const CSV_COLUMNS = [
  'id',
  'conversation_id',
  'answer_id',
  'author',
  'kind',
  'reaction',
  'comment',
  'created_at',
] as const;

@Injectable()
export class FeedbackAggregatorService {
  private readonly logger = new Logger(FeedbackAggregatorService.name);

  constructor(@Inject(FEEDBACK_REPOSITORY) private readonly repo: FeedbackRepository) {}

  /**
   * Appends feedback for a turn. The newest entry per (turn, author) is the
   * active one; `removed` retracts it when it names the active reaction.
   * History is never rewritten.
   */
  async record(
    turn: TurnReference,
    author: string,
    kind: FeedbackKind,
    comment?: string,
    opts: { reaction?: string; now?: Date } = {},
  ): Promise<Feedback> {
    const feedback: Feedback = Object.freeze({
      id: uuidv4(),
      turn: Object.freeze({ conversationId: turn.conversationId, answerId: turn.answerId }),
      author,
      kind,
      ...(comment ? { comment } : {}),
      ...(opts.reaction ? { reaction: opts.reaction } : {}),
      createdAt: (opts.now ?? new Date()).toISOString(),
    });

    await this.repo.append(feedback);
    this.logger.log(
      `Feedback ${kind} on ${turn.conversationId}/${turn.answerId} by ${author}`,
    );
    return feedback;
  }

  /** Records a chat reaction; reactions without a meaning are ignored and return null. */
  async recordReaction(event: ReactionEvent, now?: Date): Promise<Feedback | null> {
    const translated = toFeedback(event);
    if (!translated) {
      this.logger.debug(`Ignoring reaction ${event.reaction}`);
      return null;
    }
    return this.record(translated.turn, translated.author, translated.kind, undefined, {
      reaction: translated.reaction,
      now,
    });
  }

  /**
   * Counts of active feedback as of the end of the window, restricted to entries
   * created inside it.
   */
  async stats(window: TimeWindow = {}, groupBy: GroupBy = 'none'): Promise<FeedbackStats> {
    const active = await this.active(window);

    const groups = new Map<string, Feedback[]>();
    if (groupBy !== 'none') {
      for (const f of active) {
        const key = groupKey(f, groupBy);
        const bucket = groups.get(key) ?? [];
        bucket.push(f);
        groups.set(key, bucket);
      }
    }

    return {
      window: {
        from: window.from?.toISOString() ?? null,
        to: window.to?.toISOString() ?? null,
      },
      groupBy,
      totals: countKinds(active),
      groups: [...groups.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, items]) => ({ key, counts: countKinds(items) })),
    };
  }

  /** Full feedback history inside the window, removals included. */
  async export(window: TimeWindow = {}, format: ExportFormat = 'json'): Promise<string> {
    const entries = (await this.repo.history(window.to)).filter((f) => inWindow(f, window));

    if (format === 'json') {
      return JSON.stringify(entries, null, 2);
    }

    const lines = [CSV_COLUMNS.join(',')];
    for (const f of entries) {
      lines.push(
        [
          f.id,
          f.turn.conversationId,
          f.turn.answerId,
          f.author,
          f.kind,
          f.reaction ?? '',
          f.comment ?? '',
          f.createdAt,
        ]
          .map(csvField)
          .join(','),
      );
    }
    return lines.join('\n') + '\n';
  }

  private async active(window: TimeWindow): Promise<Feedback[]> {
    const latest = new Map<string, Feedback>();
    for (const f of await this.repo.history(window.to)) {
      const key = `${f.turn.conversationId}\u0000${f.turn.answerId}\u0000${f.author}`;
      if (f.kind === 'removed' && !retracts(f, latest.get(key))) continue;
      latest.set(key, f);
    }
    return [...latest.values()].filter((f) => f.kind !== 'removed' && inWindow(f, window));
  }
}

export function countKinds(items: readonly Feedback[]): KindCounts {
  const counts = { positive: 0, negative: 0, neutral: 0 };
  for (const f of items) {
    if (f.kind !== 'removed') counts[f.kind]++;
  }
  const total = counts.positive + counts.negative + counts.neutral;
  return {
    ...counts,
    total,
    positivePercentage: total ? Math.round((counts.positive / total) * 10000) / 100 : 0,
  };
}

/** A removal only retracts the active entry when it names the same reaction (or either names none). */
function retracts(removal: Feedback, current: Feedback | undefined) {
  if (!current || current.kind === 'removed') return false;
  if (!removal.reaction || !current.reaction) return true;
  return removal.reaction === current.reaction;
}

function groupKey(f: Feedback, groupBy: Exclude<GroupBy, 'none'>) {
  switch (groupBy) {
    case 'day':
      return f.createdAt.slice(0, 10);
    case 'conversation':
      return f.turn.conversationId;
    case 'author':
      return f.author;
  }
}

function inWindow(f: Feedback, window: TimeWindow) {
  const t = Date.parse(f.createdAt);
  if (window.from && t < window.from.getTime()) return false;
  if (window.to && t > window.to.getTime()) return false;
  return true;
}

function csvField(value: string) {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
