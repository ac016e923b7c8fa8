import { Question } from '../types/poll.types';

export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * ONE_DAY_MS);
}

/**
 * True when the question went live within the trailing day, inclusive at both ends.
 * A question scheduled for later is never "recent".
 */
export function wasPublishedRecently(
  question: Pick<Question, 'pubDate'>,
  now: Date = new Date(),
): boolean {
  const published = new Date(question.pubDate).getTime();
  return now.getTime() - ONE_DAY_MS <= published && published <= now.getTime();
}

export function isPublished(
  question: Pick<Question, 'pubDate'>,
  now: Date = new Date(),
): boolean {
  return new Date(question.pubDate).getTime() <= now.getTime();
}
