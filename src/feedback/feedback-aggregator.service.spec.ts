import { FeedbackAggregatorService } from './feedback-aggregator.service';
import { InMemoryFeedbackRepository } from './feedback.repository';

const at = (hhmm: string, day = '02') => new Date(`2026-03-${day}T${hhmm}:00.000Z`);
const turn = (conversationId = 'c1', answerId = 'a1') => ({ conversationId, answerId });

function setup() {
  const repo = new InMemoryFeedbackRepository();
  return { repo, feedback: new FeedbackAggregatorService(repo) };
}

describe('FeedbackAggregatorService', () => {
  it('counts only the latest feedback of each author on a turn', async () => {
    const { feedback } = setup();
    await feedback.record(turn(), 'u1', 'positive', undefined, { now: at('10:00') });
    await feedback.record(turn(), 'u1', 'negative', 'outdated', { now: at('10:05') });
    await feedback.record(turn(), 'u2', 'positive', undefined, { now: at('10:06') });

    const stats = await feedback.stats();

    expect(stats.totals).toEqual({
      positive: 1,
      negative: 1,
      neutral: 0,
      total: 2,
      positivePercentage: 50,
    });
  });

  it('drops retracted feedback from the counts but keeps it in the history', async () => {
    const { feedback } = setup();
    await feedback.record(turn(), 'u1', 'positive', undefined, { now: at('10:00') });
    await feedback.record(turn(), 'u1', 'removed', undefined, { now: at('10:01') });

    const stats = await feedback.stats();
    const history: unknown = JSON.parse(await feedback.export());

    expect(stats.totals).toEqual({ positive: 0, negative: 0, neutral: 0, total: 0, positivePercentage: 0 });
    expect(history).toHaveLength(2);
  });

  it('reports zero counts for an empty window', async () => {
    const { feedback } = setup();

    await expect(feedback.stats({ from: at('09:00'), to: at('10:00') })).resolves.toEqual({
      window: { from: '2026-03-02T09:00:00.000Z', to: '2026-03-02T10:00:00.000Z' },
      groupBy: 'none',
      totals: { positive: 0, negative: 0, neutral: 0, total: 0, positivePercentage: 0 },
      groups: [],
    });
  });

  it('evaluates the window as of its end', async () => {
    const { feedback } = setup();
    await feedback.record(turn(), 'u1', 'positive', undefined, { now: at('10:00') });
    await feedback.record(turn(), 'u1', 'negative', undefined, { now: at('12:00') });
    await feedback.record(turn('c2'), 'u2', 'neutral', undefined, { now: at('08:00') });

    const morning = await feedback.stats({ to: at('11:00') });
    expect(morning.totals).toMatchObject({ positive: 1, negative: 0, neutral: 1, total: 2 });

    const afternoon = await feedback.stats({ from: at('11:00') });
    expect(afternoon.totals).toMatchObject({ positive: 0, negative: 1, neutral: 0, total: 1 });
  });

  it('groups counts by day, conversation or author', async () => {
    const { feedback } = setup();
    await feedback.record(turn('c1', 'a1'), 'u1', 'positive', undefined, { now: at('10:00', '02') });
    await feedback.record(turn('c1', 'a2'), 'u1', 'positive', undefined, { now: at('10:00', '03') });
    await feedback.record(turn('c2', 'a3'), 'u2', 'negative', undefined, { now: at('11:00', '03') });

    const byDay = await feedback.stats({}, 'day');
    expect(byDay.groups.map((g) => [g.key, g.counts.total, g.counts.positivePercentage])).toEqual([
      ['2026-03-02', 1, 100],
      ['2026-03-03', 2, 50],
    ]);
    expect(byDay.totals.positivePercentage).toBe(66.67);

    const byAuthor = await feedback.stats({}, 'author');
    expect(byAuthor.groups.map((g) => [g.key, g.counts.positive, g.counts.negative])).toEqual([
      ['u1', 2, 0],
      ['u2', 0, 1],
    ]);

    const byConversation = await feedback.stats({}, 'conversation');
    expect(byConversation.groups.map((g) => g.key)).toEqual(['c1', 'c2']);
  });

  it('exports CSV with quoted fields', async () => {
    const { feedback } = setup();
    const entry = await feedback.record(turn(), 'u1', 'negative', 'Wrong "version", outdated', {
      now: at('10:00'),
    });

    const csv = await feedback.export({}, 'csv');

    expect(csv).toBe(
      'id,conversation_id,answer_id,author,kind,reaction,comment,created_at\n' +
        `${entry.id},c1,a1,u1,negative,,"Wrong ""version"", outdated",2026-03-02T10:00:00.000Z\n`,
    );
  });

  it('exports only entries inside the window', async () => {
    const { feedback } = setup();
    await feedback.record(turn(), 'u1', 'positive', undefined, { now: at('10:00') });
    const late = await feedback.record(turn(), 'u2', 'neutral', undefined, { now: at('12:00') });

    const exported: unknown = JSON.parse(await feedback.export({ from: at('11:00') }));

    expect(exported).toEqual([late]);
  });

  it('records reactions and their removal', async () => {
    const { feedback } = setup();
    const event = {
      type: 'reaction_added' as const,
      reaction: ':thumbsup::skin-tone-3:',
      user: 'u1',
      conversationId: 'c1',
      answerId: 'a1',
    };

    const added = await feedback.recordReaction(event, at('10:00'));
    expect(added).toMatchObject({ kind: 'positive', reaction: 'thumbsup', author: 'u1' });
    expect((await feedback.stats()).totals.positive).toBe(1);

    await feedback.recordReaction({ ...event, type: 'reaction_removed' }, at('10:01'));
    expect((await feedback.stats()).totals.total).toBe(0);

    await expect(feedback.recordReaction({ ...event, reaction: ':tada:' })).resolves.toBeNull();
  });

  it('ignores the removal of a reaction that was already replaced', async () => {
    const { feedback } = setup();
    const event = {
      type: 'reaction_added' as const,
      reaction: 'thumbsup',
      user: 'u1',
      conversationId: 'c1',
      answerId: 'a1',
    };

    await feedback.recordReaction(event, at('10:00'));
    await feedback.recordReaction({ ...event, reaction: 'thumbsdown' }, at('10:01'));
    await feedback.recordReaction({ ...event, type: 'reaction_removed' }, at('10:02'));

    expect((await feedback.stats()).totals).toEqual({
      positive: 0,
      negative: 1,
      neutral: 0,
      total: 1,
      positivePercentage: 0,
    });

    await feedback.recordReaction(
      { ...event, type: 'reaction_removed', reaction: 'thumbsdown' },
      at('10:03'),
    );
    expect((await feedback.stats()).totals.total).toBe(0);
  });

  it('keeps stored entries immutable', async () => {
    const { feedback } = setup();

    const entry = await feedback.record(turn(), 'u1', 'positive');

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.turn)).toBe(true);
  });
});
