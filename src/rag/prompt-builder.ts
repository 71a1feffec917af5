import { PromptTemplate } from '@langchain/core/prompts';
import type { Turn } from '../conversation/conversation.types';
import type { RetrievedChunk } from '../search/retriever.service';

export type RankedChunk = {
  chunk: RetrievedChunk;
  rank: number; // 1 = best
};

export type PromptSource = {
  marker: string; // "S1"
  chunk: RetrievedChunk;
};

export type BuiltPrompt = {
  text: string;
  sources: PromptSource[];
  dropped: RetrievedChunk[];
};

// NOTE: braces in the template must be escaped as `{{` `}}`; values are inserted verbatim.
const ANSWER_TEMPLATE = `
You are a knowledge assistant. Answer the question using ONLY the SOURCES below.

Rules:
- Cite every statement with the marker of the source it comes from, e.g. [S1].
- Use only markers that appear in SOURCES.
- If the sources do not contain the answer, say that you don't know.
- When listing several items, use a numbered list.

SOURCES:
<<<{sources}>>>

CONVERSATION SO FAR:
<<<{history}>>>

Question:
<<<{question}>>>
`;

/**
 * Assembles the answer prompt and holds the whole formatted text to
 * `maxContextChars`: the oldest history turns go first, then the lowest-ranked
 * sources, whole. The template and question are never cut, so a question longer
 * than the budget leaves a prompt without sources.
 */
export class PromptBuilder {
  private readonly template = new PromptTemplate({
    template: ANSWER_TEMPLATE,
    inputVariables: ['sources', 'history', 'question'],
  });

  constructor(private readonly opts: { maxContextChars: number }) {}

  async build(
    question: string,
    ranked: readonly RankedChunk[],
    history: readonly Turn[],
  ): Promise<BuiltPrompt> {
    const ordered = [...ranked].sort((a, b) => a.rank - b.rank).map((r) => r.chunk);

    let turns = [...history];
    const kept = [...ordered];
    let text = await this.format(question, kept, turns);

    while (text.length > this.opts.maxContextChars && (turns.length || kept.length)) {
      if (turns.length) {
        turns = turns.slice(1);
      } else {
        kept.pop();
      }
      text = await this.format(question, kept, turns);
    }

    const sources = kept.map((chunk, i) => ({ marker: `S${i + 1}`, chunk }));
    return { text, sources, dropped: ordered.slice(kept.length) };
  }

  private async format(question: string, chunks: readonly RetrievedChunk[], turns: readonly Turn[]) {
    const text = await this.template.format({
      sources: renderSources(chunks),
      history: renderHistory(turns),
      question,
    });
    return text.trim();
  }
}

export function renderSources(chunks: readonly RetrievedChunk[]) {
  return chunks.map((c, i) => `[S${i + 1}] ${c.title}\n${c.text.trim()}`).join('\n\n');
}

export function renderHistory(turns: readonly Turn[]) {
  if (!turns.length) return '(none)';
  return turns.map((t) => `User: ${t.resolvedQuestion}\nAssistant: ${t.answerText}`).join('\n\n');
}
