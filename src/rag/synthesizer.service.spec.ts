import { GenerationError } from '../common/errors';
import type { RetrievedChunk } from '../search/retriever.service';
import { FakeLanguageModelBackend, testConfig } from '../../test/fakes';
import type { PromptSource } from './prompt-builder';
import { extractCitations, NO_GROUNDING_MESSAGE, SynthesizerService } from './synthesizer.service';

function retrieved(sequenceIndex: number, text: string): RetrievedChunk {
  return {
    chunkId: `runbook:${sequenceIndex}`,
    recordId: `runbook@1#${sequenceIndex}`,
    documentId: 'runbook',
    version: 1,
    sequenceIndex,
    title: 'Deploy runbook',
    text,
    sourceType: 'markdown',
    structuralTag: 'body',
    score: 0.01,
  };
}

const chunks = [
  retrieved(0, 'Deployments run from the main branch.'),
  retrieved(1, 'Deploy via terraform apply.'),
];

function setup(env: Record<string, string> = {}) {
  const llm = new FakeLanguageModelBackend();
  return { llm, synthesizer: new SynthesizerService(llm, testConfig(env)) };
}

describe('SynthesizerService', () => {
  it('does not call the model without sources', async () => {
    const { llm, synthesizer } = setup();

    await expect(synthesizer.answer('How do I deploy?', [], [])).resolves.toEqual({
      answerText: NO_GROUNDING_MESSAGE,
      citations: [],
      grounded: false,
    });
    expect(llm.completeCalls).toEqual([]);
  });

  it('does not call the model when no source fits the context budget', async () => {
    const { llm, synthesizer } = setup({ PROMPT_MAX_CONTEXT_CHARS: '10' });

    const result = await synthesizer.answer('How do I deploy?', chunks, []);

    expect(result.answerText).toBe(NO_GROUNDING_MESSAGE);
    expect(llm.completeCalls).toEqual([]);
  });

  it('returns the answer with the sources it cites, in order of first citation', async () => {
    const { llm, synthesizer } = setup();
    llm.scriptCompletions('  Deploy via `terraform apply` [S2]. Merges to main trigger it [S1, S2]. See [S7].  ');

    const result = await synthesizer.answer('How do I deploy?', chunks, []);

    expect(result).toEqual({
      answerText: 'Deploy via `terraform apply` [S2]. Merges to main trigger it [S1, S2]. See [S7].',
      citations: [
        { marker: 'S2', chunkId: 'runbook:1', documentId: 'runbook', title: 'Deploy runbook' },
        { marker: 'S1', chunkId: 'runbook:0', documentId: 'runbook', title: 'Deploy runbook' },
      ],
      grounded: true,
    });
    expect(llm.completeCalls[0]).toContain('[S2] Deploy runbook\nDeploy via terraform apply.');
  });

  it('marks answers without citations as ungrounded', async () => {
    const { llm, synthesizer } = setup();
    llm.scriptCompletions("I don't know.");

    const result = await synthesizer.answer('Who founded the company?', chunks, []);

    expect(result).toEqual({ answerText: "I don't know.", citations: [], grounded: false });
  });

  it('retries a failed completion once', async () => {
    const { llm, synthesizer } = setup();
    llm.scriptCompletions(new Error('ThrottlingException'), 'Use terraform [S2].');

    const result = await synthesizer.answer('How do I deploy?', chunks, []);

    expect(result.answerText).toBe('Use terraform [S2].');
    expect(llm.completeCalls).toHaveLength(2);
  });

  it('reports the model as unavailable after the retry fails', async () => {
    const { llm, synthesizer } = setup();
    llm.scriptCompletions(new Error('ThrottlingException'), new Error('ThrottlingException'), 'late');

    const err = await synthesizer.answer('How do I deploy?', chunks, []).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({
      message: 'Language model unavailable: ThrottlingException',
      retryable: true,
      cancelled: false,
    });
    expect(llm.completeCalls).toHaveLength(2);
  });

  it('stops when the caller cancels', async () => {
    const { llm, synthesizer } = setup();
    llm.completionDelayMs = 1000;
    const controller = new AbortController();

    const pending = synthesizer.answer('How do I deploy?', chunks, [], { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    const err = await pending.catch((e: unknown) => e);

    expect(err).toMatchObject({ message: 'Generation cancelled by the caller', cancelled: true, retryable: false });
  });

  it('refuses to start for an already cancelled request', async () => {
    const { llm, synthesizer } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      synthesizer.answer('How do I deploy?', chunks, [], { signal: controller.signal }),
    ).rejects.toMatchObject({ cancelled: true });
    expect(llm.completeCalls).toEqual([]);
  });
});

describe('extractCitations', () => {
  const sources: PromptSource[] = chunks.map((chunk, i) => ({ marker: `S${i + 1}`, chunk }));

  it('accepts lower-case and spaced markers', () => {
    expect(extractCitations('Yes [ s1 ] and [S2 ,s1].', sources).map((c) => c.marker)).toEqual(['S1', 'S2']);
  });

  it('ignores markers outside the prompt', () => {
    expect(extractCitations('Maybe [S3] or [S0].', sources)).toEqual([]);
  });
});
