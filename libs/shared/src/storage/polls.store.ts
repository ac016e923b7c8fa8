import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { join } from 'path';
import { z } from 'zod';
import { pathsConfig } from '../config/configuration';
import { readJsonFile, atomicWriteJson, FileLock } from '../utils/file.utils';
import {
  Choice,
  PollsStoreFile,
  Question,
  QuestionFilter,
} from '../types/poll.types';

export const POLLS_STORE_FILENAME = 'polls.json';

const positiveInt = z.number().int().positive();

const storeFileSchema = z.object({
  nextQuestionId: positiveInt,
  nextChoiceId: positiveInt,
  questions: z.array(
    z.object({
      id: positiveInt,
      questionText: z.string(),
      pubDate: z.string().datetime({ offset: true }),
    }),
  ),
  choices: z.array(
    z.object({
      id: positiveInt,
      questionId: positiveInt,
      choiceText: z.string(),
      votes: z.number().int().nonnegative(),
    }),
  ),
}) satisfies z.ZodType<PollsStoreFile>;

function emptyStore(): PollsStoreFile {
  return { nextQuestionId: 1, nextChoiceId: 1, questions: [], choices: [] };
}

function compareQuestions(a: Question, b: Question): number {
  const diff = new Date(a.pubDate).getTime() - new Date(b.pubDate).getTime();
  return diff !== 0 ? diff : a.id - b.id;
}

/**
 * Questions and choices kept in a single JSON document under the state directory.
 * Every mutation re-reads the file while holding the lock.
 */
@Injectable()
export class PollsStore {
  private readonly logger = new Logger(PollsStore.name);
  private readonly lock: FileLock;
  private readonly storePath: string;

  constructor(
    @Inject(pathsConfig.KEY)
    private readonly pathsCfg: ConfigType<typeof pathsConfig>,
  ) {
    this.storePath = join(this.pathsCfg.stateDir, POLLS_STORE_FILENAME);
    this.lock = new FileLock(this.storePath);
  }

  getStorePath(): string {
    return this.storePath;
  }

  async createQuestion(questionText: string, pubDate: Date): Promise<Question> {
    return this.lock.withLock(() => {
      const store = this.readStore();
      const question: Question = {
        id: store.nextQuestionId,
        questionText,
        pubDate: pubDate.toISOString(),
      };
      store.nextQuestionId += 1;
      store.questions.push(question);
      atomicWriteJson(this.storePath, store);
      this.logger.log(`Question created: #${question.id} pubDate=${question.pubDate}`);
      return question;
    });
  }

  async addChoice(
    questionId: number,
    choiceText: string,
    votes: number = 0,
  ): Promise<Choice | null> {
    return this.lock.withLock(() => {
      const store = this.readStore();
      if (!store.questions.some((q) => q.id === questionId)) return null;

      const choice: Choice = {
        id: store.nextChoiceId,
        questionId,
        choiceText,
        votes,
      };
      store.nextChoiceId += 1;
      store.choices.push(choice);
      atomicWriteJson(this.storePath, store);
      this.logger.log(`Choice created: #${choice.id} for question #${questionId}`);
      return choice;
    });
  }

  async findQuestion(id: number): Promise<Question | null> {
    const store = this.readStore();
    return store.questions.find((q) => q.id === id) || null;
  }

  async findQuestions(filter: QuestionFilter): Promise<Question[]> {
    const store = this.readStore();
    let questions = store.questions;

    const { pubDateLte, search } = filter;
    if (pubDateLte) {
      const cutoff = pubDateLte.getTime();
      questions = questions.filter(
        (q) => new Date(q.pubDate).getTime() <= cutoff,
      );
    }
    if (search) {
      const needle = search.toLowerCase();
      questions = questions.filter((q) =>
        q.questionText.toLowerCase().includes(needle),
      );
    }

    const sorted = [...questions].sort(compareQuestions);
    if (filter.order === '-pubDate') sorted.reverse();

    return filter.limit !== undefined ? sorted.slice(0, filter.limit) : sorted;
  }

  async findChoices(questionId: number): Promise<Choice[]> {
    const store = this.readStore();
    return store.choices
      .filter((c) => c.questionId === questionId)
      .sort((a, b) => a.id - b.id);
  }

  async countChoices(): Promise<Map<number, number>> {
    const store = this.readStore();
    const counts = new Map<number, number>();
    for (const choice of store.choices) {
      counts.set(choice.questionId, (counts.get(choice.questionId) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Adds one vote against the current file contents, so concurrent voters
   * never overwrite each other's increments.
   */
  async incrementVotes(
    questionId: number,
    choiceId: number,
  ): Promise<Choice | null> {
    return this.lock.withLock(() => {
      const store = this.readStore();
      const choice = store.choices.find(
        (c) => c.id === choiceId && c.questionId === questionId,
      );
      if (!choice) return null;

      choice.votes += 1;
      atomicWriteJson(this.storePath, store);
      return choice;
    });
  }

  async deleteQuestion(id: number): Promise<boolean> {
    return this.lock.withLock(() => {
      const store = this.readStore();
      const before = store.questions.length;
      store.questions = store.questions.filter((q) => q.id !== id);
      if (store.questions.length === before) return false;

      store.choices = store.choices.filter((c) => c.questionId !== id);
      atomicWriteJson(this.storePath, store);
      this.logger.log(`Question deleted: #${id}`);
      return true;
    });
  }

  /** A missing, unparsable or malformed document reads as an empty store. */
  private readStore(): PollsStoreFile {
    const raw = readJsonFile<unknown>(this.storePath);
    if (raw === null) return emptyStore();

    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.logger.warn(
        `Ignoring malformed store ${this.storePath}: ${issue.path.join('.') || '(root)'} ${issue.message}`,
      );
      return emptyStore();
    }
    return parsed.data;
  }
}
