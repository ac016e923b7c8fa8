import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { PollsStore } from '@app/shared/storage/polls.store';
import { Choice, Question, QuestionWithChoices } from '@app/shared/types/poll.types';
import { wasPublishedRecently } from '@app/shared/utils/date.utils';
import { CreateChoiceInput, CreateQuestionInput } from './admin.schemas';

export interface QuestionListItem extends Question {
  wasPublishedRecently: boolean;
  choiceCount: number;
}

@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(private readonly store: PollsStore) {}

  /** Every question, scheduled ones included, newest first. */
  async listQuestions(
    search?: string,
    now: Date = new Date(),
  ): Promise<QuestionListItem[]> {
    const [questions, counts] = await Promise.all([
      this.store.findQuestions({ search, order: '-pubDate' }),
      this.store.countChoices(),
    ]);
    return questions.map((q) => ({
      ...q,
      wasPublishedRecently: wasPublishedRecently(q, now),
      choiceCount: counts.get(q.id) ?? 0,
    }));
  }

  async getQuestion(id: number): Promise<QuestionWithChoices> {
    const question = await this.store.findQuestion(id);
    if (!question) {
      throw new NotFoundException(`Question #${id} not found`);
    }
    return { ...question, choices: await this.store.findChoices(id) };
  }

  async createQuestion(
    input: CreateQuestionInput,
    now: Date = new Date(),
  ): Promise<QuestionWithChoices> {
    const pubDate = input.pubDate ? new Date(input.pubDate) : now;
    const question = await this.store.createQuestion(input.questionText, pubDate);

    const choices: Choice[] = [];
    for (const text of input.choices ?? []) {
      const choice = await this.store.addChoice(question.id, text);
      if (choice) choices.push(choice);
    }

    this.logger.log(
      `Admin created question #${question.id} with ${choices.length} choice(s)`,
    );
    return { ...question, choices };
  }

  async addChoice(questionId: number, input: CreateChoiceInput): Promise<Choice> {
    const choice = await this.store.addChoice(questionId, input.choiceText);
    if (!choice) {
      throw new NotFoundException(`Question #${questionId} not found`);
    }
    return choice;
  }

  async deleteQuestion(id: number): Promise<void> {
    const deleted = await this.store.deleteQuestion(id);
    if (!deleted) {
      throw new NotFoundException(`Question #${id} not found`);
    }
  }
}
