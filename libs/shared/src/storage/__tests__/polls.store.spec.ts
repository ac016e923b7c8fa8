import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PollsStore } from '../polls.store';
import { readJsonFile } from '../../utils/file.utils';
import { PollsStoreFile } from '../../types/poll.types';

describe('PollsStore', () => {
  let stateDir: string;
  let store: PollsStore;

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), 'polls-store-'));
    store = new PollsStore({ stateDir });
  });

  afterEach(() => {
    rmSync(stateDir, { recursive: true, force: true });
  });

  describe('createQuestion', () => {
    it('should assign increasing ids and persist to polls.json', async () => {
      const q1 = await store.createQuestion('First?', new Date('2026-01-01T00:00:00Z'));
      const q2 = await store.createQuestion('Second?', new Date('2026-01-02T00:00:00Z'));

      expect(q1).toEqual({ id: 1, questionText: 'First?', pubDate: '2026-01-01T00:00:00.000Z' });
      expect(q2.id).toBe(2);

      const file = readJsonFile<PollsStoreFile>(join(stateDir, 'polls.json'));
      expect(file?.nextQuestionId).toBe(3);
      expect(file?.questions).toHaveLength(2);
    });

    it('should not reuse ids of deleted questions', async () => {
      const q1 = await store.createQuestion('Gone?', new Date());
      await store.deleteQuestion(q1.id);
      const q2 = await store.createQuestion('New?', new Date());
      expect(q2.id).toBe(2);
    });
  });

  it('should treat an unreadable store file as empty', async () => {
    writeFileSync(join(stateDir, 'polls.json'), 'garbage', 'utf8');
    expect(await store.findQuestions({ order: '-pubDate' })).toEqual([]);
  });

  it.each(['{}', '[]', '{"questions":5}', '{"nextQuestionId":1,"nextChoiceId":1,"questions":[{"id":"x"}],"choices":[]}'])(
    'should treat a store file of the wrong shape (%s) as empty',
    async (content) => {
      writeFileSync(join(stateDir, 'polls.json'), content, 'utf8');

      expect(await store.findQuestions({ order: '-pubDate' })).toEqual([]);
      expect(await store.findQuestion(1)).toBeNull();
      expect(await store.findChoices(1)).toEqual([]);

      const created = await store.createQuestion('Fresh start?', new Date('2026-01-01T00:00:00Z'));
      expect(created.id).toBe(1);
      expect(await store.findQuestions({ order: 'pubDate' })).toEqual([created]);
    },
  );

  describe('findQuestions', () => {
    beforeEach(async () => {
      await store.createQuestion('Old cats?', new Date('2026-01-01T00:00:00Z'));
      await store.createQuestion('Recent dogs?', new Date('2026-02-01T00:00:00Z'));
      await store.createQuestion('Future CATS?', new Date('2026-06-01T00:00:00Z'));
    });

    it('should filter by pubDate and order newest first', async () => {
      const result = await store.findQuestions({
        pubDateLte: new Date('2026-03-01T00:00:00Z'),
        order: '-pubDate',
      });
      expect(result.map((q) => q.questionText)).toEqual(['Recent dogs?', 'Old cats?']);
    });

    it('should include a question published exactly at the cutoff', async () => {
      const result = await store.findQuestions({
        pubDateLte: new Date('2026-02-01T00:00:00Z'),
        order: 'pubDate',
      });
      expect(result.map((q) => q.id)).toEqual([1, 2]);
    });

    it('should search case-insensitively', async () => {
      const result = await store.findQuestions({ search: 'cats', order: 'pubDate' });
      expect(result.map((q) => q.id)).toEqual([1, 3]);
    });

    it('should apply the limit after ordering', async () => {
      const result = await store.findQuestions({ order: '-pubDate', limit: 2 });
      expect(result.map((q) => q.id)).toEqual([3, 2]);
    });

    it('should break pubDate ties by id', async () => {
      await store.createQuestion('Twin?', new Date('2026-02-01T00:00:00Z'));
      const newest = await store.findQuestions({ order: '-pubDate' });
      expect(newest.map((q) => q.id)).toEqual([3, 4, 2, 1]);
    });
  });

  describe('choices', () => {
    it('should return null when adding a choice to a missing question', async () => {
      expect(await store.addChoice(99, 'Nope')).toBeNull();
    });

    it('should list choices of one question ordered by id', async () => {
      const q1 = await store.createQuestion('Q1?', new Date());
      const q2 = await store.createQuestion('Q2?', new Date());
      await store.addChoice(q1.id, 'A');
      await store.addChoice(q2.id, 'X');
      await store.addChoice(q1.id, 'B', 3);

      const choices = await store.findChoices(q1.id);
      expect(choices).toEqual([
        { id: 1, questionId: q1.id, choiceText: 'A', votes: 0 },
        { id: 3, questionId: q1.id, choiceText: 'B', votes: 3 },
      ]);

      const counts = await store.countChoices();
      expect(counts.get(q1.id)).toBe(2);
      expect(counts.get(q2.id)).toBe(1);
    });
  });

  describe('incrementVotes', () => {
    it('should add one vote to the choice', async () => {
      const q = await store.createQuestion('Q?', new Date());
      const c = await store.addChoice(q.id, 'A');

      const updated = await store.incrementVotes(q.id, c?.id ?? -1);
      expect(updated?.votes).toBe(1);
      expect((await store.findChoices(q.id))[0].votes).toBe(1);
    });

    it('should refuse a choice that belongs to another question', async () => {
      const q1 = await store.createQuestion('Q1?', new Date());
      const q2 = await store.createQuestion('Q2?', new Date());
      const c = await store.addChoice(q2.id, 'Theirs');

      expect(await store.incrementVotes(q1.id, c?.id ?? -1)).toBeNull();
    });

    it('should not lose concurrent votes', async () => {
      const q = await store.createQuestion('Q?', new Date());
      const c = await store.addChoice(q.id, 'A');
      const choiceId = c?.id ?? -1;

      await Promise.all(
        Array.from({ length: 5 }, () => store.incrementVotes(q.id, choiceId)),
      );
      expect((await store.findChoices(q.id))[0].votes).toBe(5);
    });
  });

  describe('deleteQuestion', () => {
    it('should remove the question with its choices', async () => {
      const q = await store.createQuestion('Q?', new Date());
      await store.addChoice(q.id, 'A');

      expect(await store.deleteQuestion(q.id)).toBe(true);
      expect(await store.findQuestion(q.id)).toBeNull();
      expect(await store.findChoices(q.id)).toEqual([]);
    });

    it('should return false for a missing question', async () => {
      expect(await store.deleteQuestion(1)).toBe(false);
    });
  });
});
