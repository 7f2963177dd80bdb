import { TemplateError } from '../errors';
import { JsonValue } from '../interfaces/json';
import { Fragment, MappedData } from '../interfaces/widget';
import { escapeHtml } from '../utils/html';
import { field, lines, listField } from './helpers';

const pad = (n: number) => String(n).padStart(2, '0');

export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function renderKeyValue(data: MappedData): Fragment {
  const title = escapeHtml(field(data, 'title', 'Value'));
  const value = escapeHtml(field(data, 'value', 'N/A'));
  const unit = escapeHtml(field(data, 'unit'));

  return lines(
    '<div class="widget-content">',
    '  <div class="value-display text-center">',
    `    <div class="label mb-sm">${title}</div>`,
    `    <div class="value value--large">${value}${unit}</div>`,
    '  </div>',
    '</div>'
  );
}

export function renderTitleSubtitleValue(data: MappedData): Fragment {
  const subtitle = field(data, 'subtitle');
  const description = field(data, 'description');

  return lines(
    '<div class="widget-content text-center">',
    `  <div class="title mb-md">${escapeHtml(field(data, 'title', 'Title'))}</div>`,
    subtitle && `  <div class="subtitle mb-sm">${escapeHtml(subtitle)}</div>`,
    `  <div class="value value--large mb-md">${escapeHtml(field(data, 'value', 'N/A'))}</div>`,
    description && `  <div class="description mt-sm">${escapeHtml(description)}</div>`,
    '</div>'
  );
}

export function renderWeatherCurrent(data: MappedData): Fragment {
  const humidity = field(data, 'humidity');
  const windSpeed = field(data, 'wind_speed');

  return lines(
    '<div class="widget-content">',
    '  <div class="weather-current">',
    '    <div class="weather-icon">',
    `      <div style="font-size: 48px;">${escapeHtml(field(data, 'icon', '🌤️'))}</div>`,
    '    </div>',
    '    <div class="weather-temp">',
    `      <div class="value value--huge">${escapeHtml(field(data, 'temperature', 'N/A'))}°</div>`,
    `      <div class="subtitle">${escapeHtml(field(data, 'condition', 'Unknown'))}</div>`,
    '    </div>',
    '  </div>',
    humidity && `  <div class="description">Humidity: ${escapeHtml(humidity)}%</div>`,
    windSpeed && `  <div class="description">Wind: ${escapeHtml(windSpeed)} m/s</div>`,
    '</div>'
  );
}

export function renderTimeDisplay(data: MappedData): Fragment {
  const now = new Date();
  const timezone = field(data, 'timezone');
  const format = field(data, 'format');

  return lines(
    '<div class="widget-content">',
    '  <div class="time-display">',
    '    <div class="time-main">',
    `      <div class="value value--huge">${escapeHtml(field(data, 'time', formatTime(now)))}</div>`,
    `      <div class="subtitle">${escapeHtml(field(data, 'date', formatDate(now)))}</div>`,
    '    </div>',
    '    <div class="time-meta">',
    timezone && `      <div class="meta">${escapeHtml(timezone)}</div>`,
    format && `      <div class="meta">${escapeHtml(format)}</div>`,
    '    </div>',
    '  </div>',
    '</div>'
  );
}

export function renderTextBlock(data: MappedData): Fragment {
  const title = field(data, 'title');
  const author = field(data, 'author');
  const timestamp = field(data, 'timestamp');

  return lines(
    '<div class="widget-content">',
    title && `  <div class="title mb-md">${escapeHtml(title)}</div>`,
    `  <div class="description mb-md">${escapeHtml(field(data, 'content', 'No content'))}</div>`,
    author && `  <div class="meta">— ${escapeHtml(author)}</div>`,
    timestamp && `  <div class="meta">${escapeHtml(timestamp)}</div>`,
    '</div>'
  );
}

function toNumber(point: JsonValue): number {
  if (typeof point === 'number' && Number.isFinite(point)) return point;

  if (typeof point === 'string' && point.trim() !== '') {
    const parsed = Number(point);
    if (Number.isFinite(parsed)) return parsed;
  }

  throw new TemplateError('Data points must be numeric', { point });
}

export function renderChartSimple(data: MappedData): Fragment {
  const title = escapeHtml(field(data, 'title', 'Chart'));
  const unit = escapeHtml(field(data, 'unit'));
  const points = listField(data, 'data_points', 'Data points must be an array').map(toNumber);

  if (points.length === 0) {
    return lines(
      '<div class="widget-content">',
      `  <div class="title mb-md">${title}</div>`,
      '  <div class="description">No data available</div>',
      '</div>'
    );
  }

  // long series: no spreading into Math.min/Math.max
  const stats = points.reduce(
    (acc, n) => ({ min: Math.min(acc.min, n), max: Math.max(acc.max, n), sum: acc.sum + n }),
    { min: Infinity, max: -Infinity, sum: 0 }
  );
  const stat = (label: string, value: string) =>
    lines(
      '    <div class="metric-item">',
      '      <div class="metric-info">',
      `        <div class="label">${label}</div>`,
      `        <div class="value">${value} ${unit}</div>`,
      '      </div>',
      '    </div>'
    );

  return lines(
    '<div class="widget-content">',
    `  <div class="title mb-md">${title}</div>`,
    '  <div class="metrics-grid">',
    stat('Min', String(stats.min)),
    stat('Max', String(stats.max)),
    stat('Avg', (stats.sum / points.length).toFixed(1)),
    '  </div>',
    '</div>'
  );
}

export function renderImageCaption(data: MappedData): Fragment {
  const imageUrl = field(data, 'image_url');
  const title = field(data, 'title');
  const caption = field(data, 'caption');

  if (!imageUrl) {
    throw new TemplateError('Image URL is required');
  }

  return lines(
    '<div class="widget-content text-center">',
    title && `  <div class="title mb-md">${escapeHtml(title)}</div>`,
    `  <img src="${escapeHtml(imageUrl)}" alt="${escapeHtml(field(data, 'alt_text', 'Image'))}" style="max-width: 100%; height: auto; border-radius: var(--border-radius);">`,
    caption && `  <div class="description mt-md">${escapeHtml(caption)}</div>`,
    '</div>'
  );
}
