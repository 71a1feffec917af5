export const FEEDBACK_KINDS = ['positive', 'negative', 'neutral', 'removed'] as const;

export type FeedbackKind = (typeof FEEDBACK_KINDS)[number];

export type TurnReference = {
  conversationId: string;
  answerId: string;
};

export type Feedback = Readonly<{
  id: string;
  turn: Readonly<TurnReference>;
  author: string;
  kind: FeedbackKind;
  comment?: string;
  reaction?: string;
  createdAt: string;
}>;

export type TimeWindow = {
  from?: Date;
  to?: Date;
};

export type GroupBy = 'none' | 'day' | 'conversation' | 'author';

export type KindCounts = {
  positive: number;
  negative: number;
  neutral: number;
  total: number;
  positivePercentage: number;
};

export type FeedbackStats = {
  window: { from: string | null; to: string | null };
  groupBy: GroupBy;
  totals: KindCounts;
  groups: Array<{ key: string; counts: KindCounts }>;
};

export type ExportFormat = 'json' | 'csv';
