import { escapeHtml } from '@app/shared/utils/html.utils';
import { renderLayout } from './layout.formatter';

const ERROR_PAGES: Record<number, { title: string; detail: string }> = {
  400: { title: 'Bad Request', detail: 'The request could not be understood.' },
  404: {
    title: 'Not Found',
    detail: 'The requested resource was not found on this server.',
  },
  405: { title: 'Method Not Allowed', detail: 'The method is not allowed for this resource.' },
  500: { title: 'Server Error', detail: 'An unexpected error occurred.' },
};

export function buildErrorPage(status: number): string {
  const page = ERROR_PAGES[status] || {
    title: `Error ${status}`,
    detail: 'The request could not be completed.',
  };
  return renderLayout(
    page.title,
    `<h1>${escapeHtml(page.title)}</h1>\n<p>${escapeHtml(page.detail)}</p>`,
  );
}
