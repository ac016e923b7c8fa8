import { Question } from '@app/shared/types/poll.types';
import { escapeHtml } from '@app/shared/utils/html.utils';
import { renderLayout } from './layout.formatter';

export const NO_POLLS_MESSAGE = 'No polls are available.';

export interface IndexContext {
  latestQuestionList: Question[];
}

export function buildIndexPage(context: IndexContext): string {
  if (context.latestQuestionList.length === 0) {
    return renderLayout('Polls', `<p>${NO_POLLS_MESSAGE}</p>`);
  }

  const items = context.latestQuestionList.map(
    (q) =>
      `<li><a href="/polls/${q.id}/">${escapeHtml(q.questionText)}</a></li>`,
  );
  return renderLayout('Polls', `<ul>\n${items.join('\n')}\n</ul>`);
}
