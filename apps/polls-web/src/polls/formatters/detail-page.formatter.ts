import { QuestionWithChoices } from '@app/shared/types/poll.types';
import { escapeHtml } from '@app/shared/utils/html.utils';
import { renderLayout } from './layout.formatter';

export interface DetailContext {
  question: QuestionWithChoices;
  errorMessage?: string;
}

export function buildDetailPage(context: DetailContext): string {
  const { question, errorMessage } = context;
  const lines: string[] = [
    `<form action="/polls/${question.id}/vote/" method="post">`,
    '<fieldset>',
    `<legend><h1>${escapeHtml(question.questionText)}</h1></legend>`,
  ];

  if (errorMessage) {
    lines.push(`<p><strong>${escapeHtml(errorMessage)}</strong></p>`);
  }

  question.choices.forEach((choice, i) => {
    const inputId = `choice${i + 1}`;
    lines.push(
      `<input type="radio" name="choice" id="${inputId}" value="${choice.id}">` +
        `<label for="${inputId}">${escapeHtml(choice.choiceText)}</label><br>`,
    );
  });

  lines.push('</fieldset>', '<input type="submit" value="Vote">', '</form>');
  return renderLayout(question.questionText, lines.join('\n'));
}
