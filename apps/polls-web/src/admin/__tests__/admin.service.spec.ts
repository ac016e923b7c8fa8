import { NotFoundException } from '@nestjs/common';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PollsStore } from '@app/shared/storage/polls.store';
import { AdminService } from '../admin.service';

describe('AdminService', () => {
  let stateDir: string;
  let store: PollsStore;
  let service: AdminService;
  const now = new Date('2026-05-10T12:00:00.000Z');

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), 'polls-admin-'));
    store = new PollsStore({ stateDir });
    service = new AdminService(store);
  });

  afterEach(() => {
    rmSync(stateDir, { recursive: true, force: true });
  });

  describe('createQuestion', () => {
    it('should create the question with its choices', async () => {
      const created = await service.createQuestion(
        {
          questionText: 'Best season?',
          pubDate: '2026-05-01T00:00:00Z',
          choices: ['Spring', 'Autumn'],
        },
        now,
      );

      expect(created).toEqual({
        id: 1,
        questionText: 'Best season?',
        pubDate: '2026-05-01T00:00:00.000Z',
        choices: [
          { id: 1, questionId: 1, choiceText: 'Spring', votes: 0 },
          { id: 2, questionId: 1, choiceText: 'Autumn', votes: 0 },
        ],
      });
    });

    it('should default pubDate to now', async () => {
      const created = await service.createQuestion({ questionText: 'Now?' }, now);
      expect(created.pubDate).toBe('2026-05-10T12:00:00.000Z');
      expect(created.choices).toEqual([]);
    });
  });

  describe('listQuestions', () => {
    it('should include scheduled questions with recency and choice counts', async () => {
      await service.createQuestion(
        { questionText: 'Old one?', pubDate: '2026-04-01T00:00:00Z', choices: ['a'] },
        now,
      );
      await service.createQuestion(
        { questionText: 'Fresh one?', pubDate: '2026-05-10T06:00:00Z', choices: ['a', 'b'] },
        now,
      );
      await service.createQuestion(
        { questionText: 'Scheduled one?', pubDate: '2026-06-01T00:00:00Z' },
        now,
      );

      const list = await service.listQuestions(undefined, now);
      expect(
        list.map((q) => [q.questionText, q.wasPublishedRecently, q.choiceCount]),
      ).toEqual([
        ['Scheduled one?', false, 0],
        ['Fresh one?', true, 2],
        ['Old one?', false, 1],
      ]);
    });

    it('should filter by search text', async () => {
      await service.createQuestion({ questionText: 'Favourite pizza?' }, now);
      await service.createQuestion({ questionText: 'Favourite pasta?' }, now);

      const list = await service.listQuestions('PIZZA', now);
      expect(list.map((q) => q.questionText)).toEqual(['Favourite pizza?']);
    });
  });

  describe('getQuestion', () => {
    it('should throw NotFoundException for a missing question', async () => {
      await expect(service.getQuestion(1)).rejects.toThrow(NotFoundException);
    });
  });

  describe('addChoice', () => {
    it('should append a choice to an existing question', async () => {
      const q = await service.createQuestion({ questionText: 'Q?' }, now);
      const choice = await service.addChoice(q.id, { choiceText: 'Yes' });
      expect(choice).toEqual({ id: 1, questionId: q.id, choiceText: 'Yes', votes: 0 });
    });

    it('should throw NotFoundException for a missing question', async () => {
      await expect(service.addChoice(9, { choiceText: 'Yes' })).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('deleteQuestion', () => {
    it('should delete an existing question', async () => {
      const q = await service.createQuestion({ questionText: 'Q?' }, now);
      await service.deleteQuestion(q.id);
      await expect(service.getQuestion(q.id)).rejects.toThrow(NotFoundException);
    });

    it('should throw NotFoundException for a missing question', async () => {
      await expect(service.deleteQuestion(1)).rejects.toThrow(NotFoundException);
    });
  });
});
