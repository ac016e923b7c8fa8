import { QuestionWithChoices } from '@app/shared/types/poll.types';
import { escapeHtml, pluralize } from '@app/shared/utils/html.utils';
import { renderLayout } from './layout.formatter';

export function formatVoteCount(votes: number): string {
  return `${votes} vote${pluralize(votes)}`;
}

export function buildResultsPage(question: QuestionWithChoices): string {
  const items = question.choices.map(
    (c) => `<li>${escapeHtml(c.choiceText)} -- ${formatVoteCount(c.votes)}</li>`,
  );

  const body = [
    `<h1>${escapeHtml(question.questionText)}</h1>`,
    '<ul>',
    ...items,
    '</ul>',
    `<a href="/polls/${question.id}/">Vote again?</a>`,
  ].join('\n');

  return renderLayout(question.questionText, body);
}
