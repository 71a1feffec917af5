import { createTurn, type Turn } from './conversation.types';
import { enumeratedItems, resolveFollowup, topicOf } from './followup-resolver';

function turn(resolvedQuestion: string, answerText = 'See the handbook [S1].'): Turn {
  return createTurn({
    id: 'a1',
    question: resolvedQuestion,
    resolvedQuestion,
    retrievedChunkIds: [],
    answerText,
    citations: [],
    createdAt: '2026-03-02T09:00:00.000Z',
  });
}

describe('resolveFollowup', () => {
  it('leaves the first question of a conversation alone', () => {
    expect(resolveFollowup('What about day one?', [])).toBe('What about day one?');
  });

  it('expands an elliptical follow-up with the previous topic', () => {
    const live = [turn('What is the onboarding process?')];

    expect(resolveFollowup('What about day one?', live)).toBe(
      'What about day one in the context of the onboarding process?',
    );
    expect(resolveFollowup('and how about contractors', live)).toBe(
      'What about contractors in the context of the onboarding process?',
    );
  });

  it('replaces a pronoun with the previous topic', () => {
    const live = [turn('What is the release freeze?')];

    expect(resolveFollowup('When does it start?', live)).toBe('When does the release freeze start?');
    expect(resolveFollowup('Who approves that?', live)).toBe('Who approves the release freeze?');
  });

  it('leaves "this" and "that" alone when they qualify a noun', () => {
    const live = [turn('What is the release freeze?')];

    expect(resolveFollowup('How do I configure this service?', live)).toBe(
      'How do I configure this service?',
    );
    expect(resolveFollowup('Is that team on call?', live)).toBe('Is that team on call?');
  });

  it('does not nest the topic across chained follow-ups', () => {
    const first = resolveFollowup('What about day one?', [turn('What is the onboarding process?')]);
    const second = resolveFollowup('What about week two?', [turn(first)]);

    expect(second).toBe('What about week two in the context of the onboarding process?');
  });

  it('resolves an ordinal reference to an item of the previous answer', () => {
    const live = [
      turn(
        'How do I roll back?',
        'The steps are:\n1. Open the **release dashboard** [S1]\n2. Pick the last healthy build.\n',
      ),
    ];

    expect(resolveFollowup('Tell me more about the second one', live)).toBe(
      'Tell me more about "Pick the last healthy build"',
    );
    expect(resolveFollowup('Explain the first step', live)).toBe(
      'Explain "Open the release dashboard"',
    );
  });

  it('keeps questions that stand on their own', () => {
    const live = [turn('What is the release freeze?')];

    expect(resolveFollowup('How are secrets stored?', live)).toBe('How are secrets stored?');
  });

  it('uses only the latest turn', () => {
    const live = [turn('What is the release freeze?'), turn('Who is the owner of the billing service?')];

    expect(resolveFollowup('What about on weekends?', live)).toBe(
      'What about on weekends in the context of the owner of the billing service?',
    );
  });
});

describe('topicOf', () => {
  it.each([
    ['What is the onboarding process?', 'the onboarding process'],
    ['How do I rotate the API keys?', 'rotate the API keys'],
    ['Who is the owner of the billing service?', 'the owner of the billing service'],
    ['Deploy steps', 'Deploy steps'],
    ['What about day one in the context of the onboarding process?', 'the onboarding process'],
  ])('%s -> %s', (question, topic) => {
    expect(topicOf(question)).toBe(topic);
  });
});

describe('enumeratedItems', () => {
  it('collects numbered and bulleted lines without markup', () => {
    const answer = 'Intro line\n- Alpha.\n* `beta`;\n• Gamma\nplain line\n3) Delta [S2]';

    expect(enumeratedItems(answer)).toEqual(['Alpha', 'beta', 'Gamma', 'Delta']);
  });
});
