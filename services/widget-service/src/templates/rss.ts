import { JsonValue, isJsonObject } from '../interfaces/json';
import { Fragment, MappedData } from '../interfaces/widget';
import { escapeHtml, truncate } from '../utils/html';
import { field, lines, listField, renderItems, toText } from './helpers';

export const RSS_HEADLINES_LIMIT = 10;
export const SUMMARY_DESCRIPTION_LIMIT = 200;
export const FEED_DESCRIPTION_LIMIT = 150;

type Headline = {
  title: string;
  description: string;
  link: string;
  pubDate: string;
  author: string;
};

/** Feed items are usually objects; a bare scalar is taken as the title. */
function toHeadline(item: JsonValue): Headline {
  if (!isJsonObject(item)) {
    return { title: toText(item), description: '', link: '', pubDate: '', author: '' };
  }

  return {
    title: field(item, 'title', 'Untitled'),
    description: field(item, 'description'),
    link: field(item, 'link'),
    pubDate: field(item, 'pub_date'),
    author: field(item, 'author'),
  };
}

export function renderRssHeadlines(data: MappedData): Fragment {
  const feedTitle = escapeHtml(field(data, 'feed_title', 'RSS Feed'));
  const entries = listField(data, 'items', 'RSS items must be an array');

  const items = renderItems(entries, RSS_HEADLINES_LIMIT, 'headline', (item) => {
    const { title, link, pubDate } = toHeadline(item);
    const text = link
      ? `<a href="${escapeHtml(link)}" target="_blank">${escapeHtml(title)}</a>`
      : escapeHtml(title);

    return lines(
      '    <div class="metric-item">',
      '      <div class="metric-info">',
      `        <div class="subtitle">• ${text}</div>`,
      pubDate && `        <div class="meta">${escapeHtml(pubDate)}</div>`,
      '      </div>',
      '    </div>'
    );
  });

  return lines(
    '<div class="widget-content">',
    `  <div class="title mb-md">${feedTitle}</div>`,
    '  <div class="metrics-grid">',
    ...(items.length ? items : ['    <div class="description">No headlines available</div>']),
    '  </div>',
    '</div>'
  );
}

export function renderRssSummary(data: MappedData): Fragment {
  const feedTitle = escapeHtml(field(data, 'feed_title', 'RSS Feed'));
  const entries = data['items'];

  if (!Array.isArray(entries) || entries.length === 0) {
    return lines(
      '<div class="widget-content text-center">',
      `  <div class="title mb-md">${feedTitle}</div>`,
      '  <div class="description">No articles available</div>',
      '</div>'
    );
  }

  const { title, description, author, pubDate, link } = toHeadline(entries[0]);

  return lines(
    '<div class="widget-content">',
    `  <div class="title mb-md">${feedTitle}</div>`,
    `  <div class="subtitle mb-sm">${escapeHtml(title)}</div>`,
    `  <div class="description mb-md">${escapeHtml(truncate(description, SUMMARY_DESCRIPTION_LIMIT))}</div>`,
    author && `  <div class="meta">By: ${escapeHtml(author)}</div>`,
    pubDate && `  <div class="meta">${escapeHtml(pubDate)}</div>`,
    link && `  <div class="meta"><a href="${escapeHtml(link)}" target="_blank">Read more</a></div>`,
    '</div>'
  );
}

export function renderRssFeedInfo(data: MappedData): Fragment {
  const description = truncate(field(data, 'feed_description'), FEED_DESCRIPTION_LIMIT);
  const link = field(data, 'feed_link');
  const lastUpdated = field(data, 'last_updated');
  const entries = data['items'];
  const itemCount = Array.isArray(entries) ? entries.length : 0;

  return lines(
    '<div class="widget-content text-center">',
    `  <div class="title mb-md">${escapeHtml(field(data, 'feed_title', 'RSS Feed'))}</div>`,
    description && `  <div class="description mb-md">${escapeHtml(description)}</div>`,
    `  <div class="value value--large mb-md">${itemCount}</div>`,
    '  <div class="subtitle mb-md">Articles Available</div>',
    link && `  <div class="meta"><a href="${escapeHtml(link)}" target="_blank">Visit Feed</a></div>`,
    lastUpdated && `  <div class="meta">Last Updated: ${escapeHtml(lastUpdated)}</div>`,
    '</div>'
  );
}
