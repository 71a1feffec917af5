import stopwordList from './stopwords.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export function isStopword(token: string) {
  return STOPWORDS.has(token);
}

/** Lower-cased word tokens, punctuation stripped. Keeps digits and inner hyphens. */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+(?:[-'][\p{L}\p{N}]+)*/gu) ?? []).map((t) =>
    t.replace(/'s$/, ''),
  );
}

/** Tokens worth searching for: stopwords and single characters removed, order kept, de-duplicated. */
export function keywordTerms(text: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const t of tokenize(text)) {
    if (t.length < 2 || isStopword(t) || seen.has(t)) continue;
    seen.add(t);
    out.push(t);
  }
  return out;
}
