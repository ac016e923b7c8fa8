import { Injectable, Inject, Logger, NotFoundException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { z } from 'zod';
import { pollsConfig } from '@app/shared/config/configuration';
import { PollsStore } from '@app/shared/storage/polls.store';
import { QuestionWithChoices } from '@app/shared/types/poll.types';
import { isPublished } from '@app/shared/utils/date.utils';
import { IndexContext } from './formatters/index-page.formatter';
import { DetailContext } from './formatters/detail-page.formatter';

export const NO_CHOICE_SELECTED = "You didn't select a choice.";

const voteFormSchema = z.object({
  choice: z.coerce.number().int().positive(),
});

export type VoteOutcome =
  | { status: 'voted'; question: QuestionWithChoices }
  | { status: 'rejected'; context: DetailContext };

@Injectable()
export class PollsService {
  private readonly logger = new Logger(PollsService.name);

  constructor(
    private readonly store: PollsStore,
    @Inject(pollsConfig.KEY)
    private readonly pollsCfg: ConfigType<typeof pollsConfig>,
  ) {}

  /** The latest published questions, newest first. */
  async getIndexContext(now: Date = new Date()): Promise<IndexContext> {
    const latestQuestionList = await this.store.findQuestions({
      pubDateLte: now,
      order: '-pubDate',
      limit: this.pollsCfg.latestLimit,
    });
    return { latestQuestionList };
  }

  /**
   * Looks a question up among those already published.
   * Unknown and scheduled questions are both a 404.
   */
  async getPublishedQuestion(
    id: number,
    now: Date = new Date(),
  ): Promise<QuestionWithChoices> {
    const question = await this.store.findQuestion(id);
    if (!question || !isPublished(question, now)) {
      throw new NotFoundException(`No question matches id ${id}`);
    }
    const choices = await this.store.findChoices(id);
    return { ...question, choices };
  }

  async getDetailContext(id: number, now: Date = new Date()): Promise<DetailContext> {
    return { question: await this.getPublishedQuestion(id, now) };
  }

  async vote(
    id: number,
    form: unknown,
    now: Date = new Date(),
  ): Promise<VoteOutcome> {
    const question = await this.getPublishedQuestion(id, now);

    const parsed = voteFormSchema.safeParse(form);
    if (!parsed.success) {
      this.logger.warn(`Vote rejected for question #${id}: no choice selected`);
      return { status: 'rejected', context: { question, errorMessage: NO_CHOICE_SELECTED } };
    }

    const choice = await this.store.incrementVotes(id, parsed.data.choice);
    if (!choice) {
      this.logger.warn(
        `Vote rejected for question #${id}: choice ${parsed.data.choice} does not exist`,
      );
      return { status: 'rejected', context: { question, errorMessage: NO_CHOICE_SELECTED } };
    }

    this.logger.log(`Vote recorded: question #${id} choice #${choice.id} votes=${choice.votes}`);
    return {
      status: 'voted',
      question: {
        ...question,
        choices: question.choices.map((c) => (c.id === choice.id ? choice : c)),
      },
    };
  }
}
