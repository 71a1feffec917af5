import type { FeedbackKind, TurnReference } from './feedback.types';

export type ReactionEvent = {
  type: 'reaction_added' | 'reaction_removed';
  reaction: string;
  user: string;
  conversationId: string;
  answerId: string;
};

export type ReactionFeedback = {
  turn: TurnReference;
  author: string;
  kind: FeedbackKind;
  reaction: string;
};

const POSITIVE = new Set(['thumbsup', '+1', 'thumbs_up', 'clap', 'raised_hands', 'heart']);
const NEGATIVE = new Set(['thumbsdown', '-1', 'thumbs_down', 'x', 'no_entry']);

/** `:thumbsup:` and `thumbsup::skin-tone-2` both become `thumbsup`. */
export function normalizeReaction(reaction: string) {
  return reaction.trim().toLowerCase().replace(/^:|:$/g, '').split('::')[0];
}

export function reactionKind(reaction: string): FeedbackKind | null {
  const name = normalizeReaction(reaction);
  if (POSITIVE.has(name)) return 'positive';
  if (NEGATIVE.has(name)) return 'negative';
  return null;
}

/**
 * Translates a chat-platform reaction into feedback. Reactions that carry no
 * opinion (and their removal) are ignored.
 */
export function toFeedback(event: ReactionEvent): ReactionFeedback | null {
  const kind = reactionKind(event.reaction);
  if (!kind) return null;

  return {
    turn: { conversationId: event.conversationId, answerId: event.answerId },
    author: event.user,
    kind: event.type === 'reaction_removed' ? 'removed' : kind,
    reaction: normalizeReaction(event.reaction),
  };
}
