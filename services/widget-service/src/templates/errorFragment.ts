import { Fragment } from '../interfaces/widget';
import { escapeHtml } from '../utils/html';

export function errorFragment(message: string): Fragment {
  return [
    '<div class="widget-error">',
    '  <div class="error-icon">⚠️</div>',
    `  <div class="error-message">${escapeHtml(message)}</div>`,
    '</div>',
  ].join('\n');
}
