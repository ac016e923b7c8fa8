import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import {
  CHOICE_TEXT_MAX_LENGTH,
  QUESTION_TEXT_MAX_LENGTH,
} from '@app/shared/types/poll.types';

const choiceText = z.string().trim().min(1).max(CHOICE_TEXT_MAX_LENGTH);

export const createQuestionSchema = z.object({
  questionText: z.string().trim().min(1).max(QUESTION_TEXT_MAX_LENGTH),
  pubDate: z.string().datetime({ offset: true }).optional(),
  choices: z.array(choiceText).max(20).optional(),
});

export const createChoiceSchema = z.object({
  choiceText,
});

export const listQuestionsQuerySchema = z.object({
  search: z.string().trim().max(QUESTION_TEXT_MAX_LENGTH).optional(),
});

export type CreateQuestionInput = z.infer<typeof createQuestionSchema>;
export type CreateChoiceInput = z.infer<typeof createChoiceSchema>;
export type ListQuestionsQuery = z.infer<typeof listQuestionsQuerySchema>;

/** Parses a request payload, turning zod issues into a 400. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequestException({
      message: 'Validation failed',
      issues: result.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
  }
  return result.data;
}
