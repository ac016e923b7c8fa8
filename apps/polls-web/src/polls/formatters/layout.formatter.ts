import { escapeHtml } from '@app/shared/utils/html.utils';

export function renderLayout(title: string, body: string): string {
  return (
    '<!DOCTYPE html>\n' +
    '<html lang="en">\n' +
    '<head>\n' +
    '<meta charset="utf-8">\n' +
    `<title>${escapeHtml(title)}</title>\n` +
    '</head>\n' +
    '<body>\n' +
    `${body}\n` +
    '</body>\n' +
    '</html>\n'
  );
}
