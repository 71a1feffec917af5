import type { Turn } from './conversation.types';

const ORDINALS: Record<string, number> = {
  first: 1,
  '1st': 1,
  second: 2,
  '2nd': 2,
  third: 3,
  '3rd': 3,
  fourth: 4,
  '4th': 4,
  fifth: 5,
  '5th': 5,
  last: -1,
};

const ORDINAL_REF =
  /\b(?:the\s+)?(first|1st|second|2nd|third|3rd|fourth|4th|fifth|5th|last)\s+(?:one|item|option|step|point)\b/i;

const ELLIPSIS = /^\s*(?:and\s+)?(?:what|how)\s+about\s+(.+?)\s*\??\s*$/i;

const ELLIPSIS_REWRITE = /^What about .+? in the context of (.+)\?$/;

// "this" and "that" only stand alone at the end: "how do I configure this service?" is left as is
const PRONOUN = /\b(it|they|them)\b/i;
const TRAILING_DEMONSTRATIVE = /\b(this|that)(?=[\s?.!]*$)/i;

const LEADING_WH =
  /^\s*(?:what|who|where|when|which|why|how)(?:\s+(?:about|is|are|was|were|do|does|did|can|could|should|would|will))?(?:\s+(?:i|we|you))?\s+/i;

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+(.+?)\s*$/;

/**
 * Rewrites a follow-up question so it stands on its own, using the live turns of
 * the conversation. Returns the question unchanged when there is nothing to go on.
 */
export function resolveFollowup(rawQuestion: string, liveTurns: readonly Turn[]): string {
  const previous = liveTurns[liveTurns.length - 1];
  if (!previous) return rawQuestion;

  const topic = topicOf(previous.resolvedQuestion);
  let question = rawQuestion;
  let rewritten = false;

  const ordinal = ORDINAL_REF.exec(question);
  if (ordinal) {
    const item = pickItem(enumeratedItems(previous.answerText), ORDINALS[ordinal[1].toLowerCase()]);
    if (item) {
      question = question.replace(ordinal[0], () => `"${item}"`);
      rewritten = true;
    }
  }

  const ellipsis = ELLIPSIS.exec(question);
  if (ellipsis && topic) {
    return `What about ${ellipsis[1]} in the context of ${topic}?`;
  }
  if (rewritten || !topic) return question;

  for (const pattern of [PRONOUN, TRAILING_DEMONSTRATIVE]) {
    if (pattern.test(question)) return question.replace(pattern, () => topic);
  }
  return question;
}

/**
 * "What is the onboarding process?" -> "the onboarding process". A question this
 * module already expanded keeps the topic it was expanded with.
 */
export function topicOf(question: string): string {
  const expanded = ELLIPSIS_REWRITE.exec(question);
  if (expanded) return expanded[1];

  const stripped = question.replace(/[?.!\s]+$/, '').replace(LEADING_WH, '').trim();
  return stripped || question.trim();
}

/** Numbered or bulleted lines of an answer, citation markers and emphasis removed. */
export function enumeratedItems(answerText: string): string[] {
  const items: string[] = [];
  for (const line of answerText.split('\n')) {
    const m = LIST_ITEM.exec(line);
    if (!m) continue;
    const item = m[1]
      .replace(/\[S\d+\]/g, '')
      .replace(/[*_`]/g, '')
      .replace(/[\s.:;,]+$/, '')
      .trim();
    if (item) items.push(item);
  }
  return items;
}

function pickItem(items: string[], ordinal: number | undefined) {
  if (ordinal === undefined || !items.length) return null;
  if (ordinal === -1) return items[items.length - 1];
  return items[ordinal - 1] ?? null;
}
