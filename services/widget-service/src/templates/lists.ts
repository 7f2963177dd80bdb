import { JsonValue } from '../interfaces/json';
import { Fragment, MappedData } from '../interfaces/widget';
import { resolvePath } from '../modules/pathResolver';
import { escapeHtml } from '../utils/html';
import { itemPath, lines, listField, optionalAt, renderItems, toText } from './helpers';

export const METRIC_GRID_LIMIT = 8;
export const STATUS_LIST_LIMIT = 10;
export const ICON_LIST_LIMIT = 8;

type StatusTone = 'success' | 'error' | 'warning' | 'neutral';

const STATUS_TONES = new Map<string, StatusTone>([
  ['online', 'success'],
  ['ok', 'success'],
  ['healthy', 'success'],
  ['success', 'success'],
  ['active', 'success'],
  ['running', 'success'],
  ['offline', 'error'],
  ['error', 'error'],
  ['failed', 'error'],
  ['down', 'error'],
  ['inactive', 'error'],
  ['warning', 'warning'],
  ['degraded', 'warning'],
  ['partial', 'warning'],
  ['slow', 'warning'],
]);

const STATUS_ICONS: Record<StatusTone, string> = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  neutral: '🔵',
};

const STATUS_CLASSES: Record<StatusTone, string> = {
  success: 'status-indicator--success',
  error: 'status-indicator--error',
  warning: 'status-indicator--warning',
  // unknown words still render as healthy
  neutral: 'status-indicator--success',
};

export function statusTone(status: string): StatusTone {
  return STATUS_TONES.get(status.trim().toLowerCase()) ?? 'neutral';
}

function grid(items: string[]): Fragment {
  return lines(
    '<div class="widget-content">',
    '  <div class="metrics-grid">',
    ...items,
    '  </div>',
    '</div>'
  );
}

export function renderMetricGrid(data: MappedData): Fragment {
  const metrics = listField(data, 'metrics', 'Metrics must be an array');
  const titlePath = itemPath(data, 'metric_title_path', 'name');
  const valuePath = itemPath(data, 'metric_value_path', 'value');
  const unitPath = itemPath(data, 'metric_unit_path', 'unit');

  const items = renderItems(metrics, METRIC_GRID_LIMIT, 'metric', (metric: JsonValue) => {
    const title = toText(resolvePath(metric, titlePath));
    const value = toText(resolvePath(metric, valuePath));
    const unit = optionalAt(metric, unitPath);

    return lines(
      '    <div class="metric-item">',
      '      <div class="metric-info">',
      `        <div class="label">${escapeHtml(title)}</div>`,
      `        <div class="value">${escapeHtml(value)}${escapeHtml(unit)}</div>`,
      '      </div>',
      '    </div>'
    );
  });

  return grid(items);
}

export function renderStatusList(data: MappedData): Fragment {
  const entries = listField(data, 'items', 'Items must be an array');
  const namePath = itemPath(data, 'item_name_path', 'name');
  const statusPath = itemPath(data, 'item_status_path', 'status');
  const messagePath = itemPath(data, 'item_message_path', 'message');

  const items = renderItems(entries, STATUS_LIST_LIMIT, 'status', (entry: JsonValue) => {
    const name = toText(resolvePath(entry, namePath));
    const status = toText(resolvePath(entry, statusPath));
    const message = optionalAt(entry, messagePath);
    const tone = statusTone(status);

    return lines(
      '    <div class="metric-item">',
      `      <div class="metric-icon">${STATUS_ICONS[tone]}</div>`,
      '      <div class="metric-info">',
      `        <div class="subtitle">${escapeHtml(name)}</div>`,
      `        <div class="status-indicator ${STATUS_CLASSES[tone]}">${escapeHtml(status)}</div>`,
      message && `        <div class="description">${escapeHtml(message)}</div>`,
      '      </div>',
      '    </div>'
    );
  });

  return grid(items);
}

export function renderIconList(data: MappedData): Fragment {
  const entries = listField(data, 'items', 'Items must be an array');
  const iconPath = itemPath(data, 'item_icon_path', 'icon');
  const titlePath = itemPath(data, 'item_title_path', 'title');
  const descriptionPath = itemPath(data, 'item_description_path', 'description');

  const items = renderItems(entries, ICON_LIST_LIMIT, 'icon', (entry: JsonValue) => {
    const icon = optionalAt(entry, iconPath);
    const title = toText(resolvePath(entry, titlePath));
    const description = optionalAt(entry, descriptionPath);

    return lines(
      '    <div class="metric-item">',
      icon && `      <div class="metric-icon">${escapeHtml(icon)}</div>`,
      '      <div class="metric-info">',
      `        <div class="subtitle">${escapeHtml(title)}</div>`,
      description && `        <div class="description">${escapeHtml(description)}</div>`,
      '      </div>',
      '    </div>'
    );
  });

  return grid(items);
}
