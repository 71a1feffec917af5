import { testConfig } from '../../test/fakes';
import { ConversationContextService } from './conversation-context.service';
import { InMemoryConversationStore } from './conversation-store';
import { createTurn, emptyConversation, type Turn } from './conversation.types';

const T0 = new Date('2026-03-02T09:00:00.000Z');
const minutes = (n: number) => new Date(T0.getTime() + n * 60_000);

function turn(id: string, resolvedQuestion: string, at: Date): Turn {
  return createTurn({
    id,
    question: resolvedQuestion,
    resolvedQuestion,
    retrievedChunkIds: ['doc:0'],
    answerText: `Answer ${id} [S1]`,
    citations: [{ marker: 'S1', chunkId: 'doc:0', documentId: 'doc', title: 'Doc' }],
    createdAt: at.toISOString(),
  });
}

function setup() {
  const store = new InMemoryConversationStore();
  const ctx = new ConversationContextService(store, testConfig({ CONVERSATION_TTL_MINUTES: '30' }));
  return { store, ctx };
}

describe('ConversationContextService', () => {
  it('moves from empty to active to expired', () => {
    const { ctx } = setup();
    const empty = emptyConversation('c1', T0);
    const active = ctx.appendTurn(empty, turn('a1', 'What is the onboarding process?', T0), T0);

    expect(ctx.state(null, T0)).toBe('empty');
    expect(ctx.state(empty, T0)).toBe('empty');
    expect(ctx.state(active, minutes(30))).toBe('active');
    expect(ctx.state(active, minutes(31))).toBe('expired');
  });

  it('appends without changing the given conversation', () => {
    const { ctx } = setup();
    const empty = emptyConversation('c1', T0);

    const next = ctx.appendTurn(empty, turn('a1', 'q1', minutes(1)), minutes(1));

    expect(empty.turns).toHaveLength(0);
    expect(next.turns.map((t) => t.id)).toEqual(['a1']);
    expect(next.lastActivityAt).toBe('2026-03-02T09:01:00.000Z');
    expect(Object.isFrozen(next)).toBe(true);
    expect(Object.isFrozen(next.turns)).toBe(true);
    expect(Object.isFrozen(next.turns[0].citations[0])).toBe(true);
  });

  it('starts a new session when appending to an expired conversation', () => {
    const { ctx } = setup();
    let conv = emptyConversation('c1', T0);
    conv = ctx.appendTurn(conv, turn('a1', 'What is the onboarding process?', T0), T0);
    conv = ctx.appendTurn(conv, turn('a2', 'What about day one?', minutes(5)), minutes(5));

    conv = ctx.appendTurn(conv, turn('a3', 'Where is the VPN guide?', minutes(60)), minutes(60));

    expect(conv.turns).toHaveLength(3);
    expect(conv.historyStartIndex).toBe(2);
    expect(ctx.liveTurns(conv, minutes(61)).map((t) => t.id)).toEqual(['a3']);
  });

  it('does not resolve follow-ups against an expired conversation', () => {
    const { ctx } = setup();
    const conv = ctx.appendTurn(
      emptyConversation('c1', T0),
      turn('a1', 'What is the onboarding process?', T0),
      T0,
    );

    expect(ctx.resolveFollowup('What about day one?', conv, minutes(10))).toBe(
      'What about day one in the context of the onboarding process?',
    );
    expect(ctx.resolveFollowup('What about day one?', conv, minutes(45))).toBe('What about day one?');
  });

  it('returns the most recent live turns as history', () => {
    const { ctx } = setup();
    let conv = emptyConversation('c1', T0);
    for (const [i, id] of ['a1', 'a2', 'a3', 'a4'].entries()) {
      conv = ctx.appendTurn(conv, turn(id, `q${i}`, minutes(i)), minutes(i));
    }

    expect(ctx.history(conv, 2, minutes(4)).map((t) => t.id)).toEqual(['a3', 'a4']);
    expect(ctx.history(conv, 0, minutes(4))).toEqual([]);
    expect(ctx.history(conv, 2, minutes(40))).toEqual([]);
  });

  it('loads a fresh conversation for unknown ids and saves what it is given', async () => {
    const { ctx } = setup();

    const loaded = await ctx.load('c9', T0);
    expect(loaded).toEqual({
      id: 'c9',
      turns: [],
      createdAt: T0.toISOString(),
      lastActivityAt: T0.toISOString(),
      historyStartIndex: 0,
    });

    const next = ctx.appendTurn(loaded, turn('a1', 'q', T0), T0);
    await ctx.save(next);
    await expect(ctx.load('c9', minutes(1))).resolves.toBe(next);
  });

  it('touches only live conversations', async () => {
    const { store, ctx } = setup();
    const conv = ctx.appendTurn(emptyConversation('c1', T0), turn('a1', 'q', T0), T0);
    await store.save(conv);

    const touched = await ctx.touch('c1', minutes(20));
    expect(touched?.lastActivityAt).toBe(minutes(20).toISOString());
    expect(ctx.state(await store.load('c1'), minutes(45))).toBe('active');

    const expired = await ctx.touch('c1', minutes(90));
    expect(expired?.lastActivityAt).toBe(minutes(20).toISOString());
    await expect(ctx.touch('nope', T0)).resolves.toBeNull();
  });
});
