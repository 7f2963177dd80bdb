import { errorFragment, renderTemplate } from '@/templates';
import { logger } from '@/logger';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const count = (html: string, needle: string) => html.split(needle).length - 1;

describe('errorFragment (unit)', () => {
  it('renders the escaped message inside the error block', () => {
    expect(errorFragment('Bad <input> & "quotes"')).toBe(
      [
        '<div class="widget-error">',
        '  <div class="error-icon">⚠️</div>',
        '  <div class="error-message">Bad &lt;input&gt; &amp; &quot;quotes&quot;</div>',
        '</div>',
      ].join('\n')
    );
  });
});

describe('renderTemplate (unit)', () => {
  /**
   * Purpose:
   * Verifies dispatch:
   * - an unknown template id yields an error fragment naming it
   */
  it('renders an error fragment for an unknown template', () => {
    const html = renderTemplate('pie_chart', {});

    expect(html).toContain('<div class="widget-error">');
    expect(html).toContain('<div class="error-message">Unknown template type: pie_chart</div>');
  });

  it('escapes an unknown template id', () => {
    expect(renderTemplate('<x>', {})).toContain('Unknown template type: &lt;x&gt;');
  });

  describe('key_value', () => {
    it('renders title, value and unit', () => {
      const html = renderTemplate('key_value', { title: 'CPU', value: 42, unit: '%' });

      expect(html).toBe(
        [
          '<div class="widget-content">',
          '  <div class="value-display text-center">',
          '    <div class="label mb-sm">CPU</div>',
          '    <div class="value value--large">42%</div>',
          '  </div>',
          '</div>',
        ].join('\n')
      );
    });

    it('shows defaults for missing and null fields', () => {
      const html = renderTemplate('key_value', { title: null });

      expect(html).toContain('<div class="label mb-sm">Value</div>');
      expect(html).toContain('<div class="value value--large">N/A</div>');
    });

    it('escapes mapped text', () => {
      const html = renderTemplate('key_value', { title: `<b>"Tom" & Jerry's</b>` });

      expect(html).toContain(
        '<div class="label mb-sm">&lt;b&gt;&quot;Tom&quot; &amp; Jerry&#39;s&lt;/b&gt;</div>'
      );
    });
  });

  describe('title_subtitle_value', () => {
    it('omits optional lines that are empty', () => {
      const html = renderTemplate('title_subtitle_value', { title: 'Sales', value: '1,204' });

      expect(html).toContain('<div class="title mb-md">Sales</div>');
      expect(html).toContain('<div class="value value--large mb-md">1,204</div>');
      expect(html).not.toContain('subtitle');
      expect(html).not.toContain('description');
    });

    it('renders subtitle and description when present', () => {
      const html = renderTemplate('title_subtitle_value', {
        title: 'Sales',
        subtitle: 'Today',
        value: 3,
        description: 'Up from yesterday',
      });

      expect(html).toContain('  <div class="subtitle mb-sm">Today</div>');
      expect(html).toContain('  <div class="description mt-sm">Up from yesterday</div>');
    });
  });

  describe('weather_current', () => {
    it('renders temperature with a degree sign and optional humidity', () => {
      const html = renderTemplate('weather_current', {
        temperature: 21,
        condition: 'Sunny',
        humidity: 40,
      });

      expect(html).toContain('<div class="weather-icon">\n      <div style="font-size: 48px;">🌤️</div>\n    </div>');
      expect(html).toContain('<div class="value value--huge">21°</div>');
      expect(html).toContain('<div class="subtitle">Sunny</div>');
      expect(html).toContain('<div class="description">Humidity: 40%</div>');
      expect(html).not.toContain('Wind:');
    });
  });

  describe('time_display', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('defaults to the current local time and date', () => {
      jest.useFakeTimers().setSystemTime(new Date(2025, 0, 6, 9, 5, 7));

      const html = renderTemplate('time_display', {});

      expect(html).toContain('<div class="value value--huge">09:05:07</div>');
      expect(html).toContain('<div class="subtitle">2025-01-06</div>');
      expect(html).not.toContain('class="meta"');
    });

    it('uses mapped time, date and timezone', () => {
      const html = renderTemplate('time_display', { time: '12:00', date: 'Monday', timezone: 'UTC' });

      expect(html).toContain('<div class="value value--huge">12:00</div>');
      expect(html).toContain('<div class="subtitle">Monday</div>');
      expect(html).toContain('      <div class="meta">UTC</div>');
    });
  });

  describe('text_block', () => {
    it('falls back to "No content" and renders the author', () => {
      const html = renderTemplate('text_block', { content: null, author: 'Ada' });

      expect(html).toContain('<div class="description mb-md">No content</div>');
      expect(html).toContain('<div class="meta">— Ada</div>');
    });
  });

  describe('chart_simple', () => {
    /**
     * Purpose:
     * Verifies summary statistics:
     * - numeric strings are accepted
     * - average is shown with one decimal
     */
    it('renders min, max and average', () => {
      const html = renderTemplate('chart_simple', { title: 'Temps', data_points: [3, '4.5', 10], unit: 'C' });

      expect(html).toContain('<div class="title mb-md">Temps</div>');
      expect(html).toContain('<div class="label">Min</div>\n        <div class="value">3 C</div>');
      expect(html).toContain('<div class="label">Max</div>\n        <div class="value">10 C</div>');
      expect(html).toContain('<div class="label">Avg</div>\n        <div class="value">5.8 C</div>');
    });

    it('shows "No data available" for an empty series', () => {
      const html = renderTemplate('chart_simple', { title: 'C', data_points: [], unit: '%' });

      expect(html).toContain('No data available');
      expect(html).not.toContain('Min');
    });

    it('renders an error fragment for non-numeric points', () => {
      const html = renderTemplate('chart_simple', { data_points: [1, 'high'] });

      expect(html).toContain('<div class="error-message">Data points must be numeric</div>');
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('summarises a long series without overflowing the stack', () => {
      const dataPoints = Array.from({ length: 500000 }, (_, i) => i);

      const html = renderTemplate('chart_simple', { data_points: dataPoints });

      expect(html).toContain('<div class="label">Min</div>\n        <div class="value">0 </div>');
      expect(html).toContain('<div class="label">Max</div>\n        <div class="value">499999 </div>');
      expect(html).toContain('<div class="label">Avg</div>\n        <div class="value">249999.5 </div>');
    });

    it('renders an error fragment when the series is not a list', () => {
      expect(renderTemplate('chart_simple', { data_points: 'nope' })).toContain(
        'Data points must be an array'
      );
    });
  });

  describe('image_caption', () => {
    it('requires an image URL', () => {
      expect(renderTemplate('image_caption', { caption: 'Sunset' })).toContain(
        '<div class="error-message">Image URL is required</div>'
      );
    });

    it('escapes the URL and defaults the alt text', () => {
      const html = renderTemplate('image_caption', { image_url: 'https://img.example.com/a.png?w=1&h=2' });

      expect(html).toContain(
        '<img src="https://img.example.com/a.png?w=1&amp;h=2" alt="Image" style="max-width: 100%; height: auto; border-radius: var(--border-radius);">'
      );
    });
  });

  describe('metric_grid', () => {
    it('caps the grid at 8 metrics', () => {
      const metrics = Array.from({ length: 10 }, (_, i) => ({ name: `M${i}`, value: i, unit: 'ms' }));

      const html = renderTemplate('metric_grid', { metrics });

      expect(count(html, 'class="metric-item"')).toBe(8);
      expect(html).toContain('<div class="label">M0</div>\n        <div class="value">0ms</div>');
      expect(html).not.toContain('M8');
    });

    /**
     * Purpose:
     * Verifies per-item degradation:
     * - an item whose required lookup fails is skipped, not fatal
     */
    it('skips items that cannot be read', () => {
      const html = renderTemplate('metric_grid', {
        metrics: [{ name: 'ok', value: 1 }, 'broken', { name: 'two', value: 2 }],
      });

      expect(count(html, 'class="metric-item"')).toBe(2);
      expect(html).toContain('<div class="value">1</div>');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ kind: 'metric' }),
        'Skipping list item'
      );
    });

    it('follows mapped item paths', () => {
      const html = renderTemplate('metric_grid', {
        metrics: [{ meta: { label: 'Disk' }, value: 70 }],
        metric_title_path: 'meta.label',
      });

      expect(html).toContain('<div class="label">Disk</div>');
    });

    it('renders an error fragment when metrics is not a list', () => {
      expect(renderTemplate('metric_grid', { metrics: 'nope' })).toContain(
        '<div class="error-message">Metrics must be an array</div>'
      );
    });

    it('treats null metrics as an empty grid', () => {
      expect(count(renderTemplate('metric_grid', { metrics: null }), 'metric-item')).toBe(0);
    });
  });

  describe('status_list', () => {
    it('picks icon and indicator class from the status word', () => {
      const html = renderTemplate('status_list', {
        items: [
          { name: 'API', status: 'online', message: 'All good' },
          { name: 'DB', status: 'DOWN' },
          { name: 'Cache', status: 'degraded' },
          { name: 'Queue', status: 'mystery' },
        ],
      });

      expect(html).toContain(
        [
          '      <div class="metric-icon">✅</div>',
          '      <div class="metric-info">',
          '        <div class="subtitle">API</div>',
          '        <div class="status-indicator status-indicator--success">online</div>',
          '        <div class="description">All good</div>',
        ].join('\n')
      );
      expect(html).toContain('<div class="metric-icon">❌</div>');
      expect(html).toContain('<div class="status-indicator status-indicator--error">DOWN</div>');
      expect(html).toContain('<div class="status-indicator status-indicator--warning">degraded</div>');
      expect(html).toContain('<div class="metric-icon">🔵</div>');
      expect(html).toContain('<div class="status-indicator status-indicator--success">mystery</div>');
      expect(count(html, 'class="description"')).toBe(1);
    });

    it('caps the list at 10 items', () => {
      const items = Array.from({ length: 12 }, (_, i) => ({ name: `S${i}`, status: 'ok' }));

      expect(count(renderTemplate('status_list', { items }), 'class="metric-item"')).toBe(10);
    });
  });

  describe('icon_list', () => {
    it('renders optional icon and description and skips unreadable items', () => {
      const html = renderTemplate('icon_list', {
        items: [{ icon: '📦', title: 'Parcel', description: 'Arrives today' }, { title: 'No icon' }, 7],
      });

      expect(count(html, 'class="metric-item"')).toBe(2);
      expect(count(html, 'class="metric-icon"')).toBe(1);
      expect(html).toContain('<div class="metric-icon">📦</div>');
      expect(html).toContain('<div class="subtitle">No icon</div>');
      expect(html).toContain('<div class="description">Arrives today</div>');
    });
  });

  describe('icon_list cap', () => {
    it('caps the list at 8 items', () => {
      const items = Array.from({ length: 11 }, (_, i) => ({ icon: '•', title: `I${i}` }));

      const html = renderTemplate('icon_list', { items });

      expect(count(html, 'class="metric-item"')).toBe(8);
      expect(html).toContain('<div class="subtitle">I7</div>');
      expect(html).not.toContain('I8');
    });
  });

  describe('rss_headlines', () => {
    it('renders linked headlines under the feed title', () => {
      const html = renderTemplate('rss_headlines', {
        feed_title: 'Feed',
        items: [{ title: 'T1', link: 'http://x' }],
      });

      expect(html).toContain('<div class="title mb-md">Feed</div>');
      expect(html).toContain('<div class="subtitle">• <a href="http://x" target="_blank">T1</a></div>');
    });

    it('renders scalar items as plain titles', () => {
      expect(renderTemplate('rss_headlines', { items: ['Plain headline'] })).toContain(
        '<div class="subtitle">• Plain headline</div>'
      );
    });

    it('caps headlines at 10', () => {
      const items = Array.from({ length: 12 }, (_, i) => ({ title: `H${i}` }));

      expect(count(renderTemplate('rss_headlines', { items }), '<div class="subtitle">')).toBe(10);
    });

    it('says so when there are no headlines', () => {
      const html = renderTemplate('rss_headlines', { items: [] });

      expect(html).toContain('<div class="title mb-md">RSS Feed</div>');
      expect(html).toContain('<div class="description">No headlines available</div>');
    });

    it('renders an error fragment when items is not a list', () => {
      expect(renderTemplate('rss_headlines', { items: { title: 'x' } })).toContain(
        'RSS items must be an array'
      );
    });
  });

  describe('rss_summary', () => {
    it('summarises the first item with a truncated description', () => {
      const html = renderTemplate('rss_summary', {
        feed_title: 'News',
        items: [
          { title: 'Lead', description: 'a'.repeat(250), author: 'Jane', link: 'https://n.example.com/1' },
          { title: 'Second' },
        ],
      });

      expect(html).toContain('<div class="subtitle mb-sm">Lead</div>');
      expect(html).toContain(`<div class="description mb-md">${'a'.repeat(200)}...</div>`);
      expect(html).toContain('<div class="meta">By: Jane</div>');
      expect(html).toContain('<a href="https://n.example.com/1" target="_blank">Read more</a>');
      expect(html).not.toContain('Second');
    });

    /**
     * Purpose:
     * Verifies truncation counts characters, not UTF-16 units:
     * - exactly 200 characters is left alone
     * - a cut never splits a surrogate pair
     */
    it('keeps a description of exactly 200 characters', () => {
      const html = renderTemplate('rss_summary', { items: [{ title: 'Lead', description: 'b'.repeat(200) }] });

      expect(html).toContain(`<div class="description mb-md">${'b'.repeat(200)}</div>`);
    });

    it('cuts after whole emoji', () => {
      const html = renderTemplate('rss_summary', {
        items: [{ title: 'Lead', description: `${'a'.repeat(199)}😀😀` }],
      });

      expect(html).toContain(`<div class="description mb-md">${'a'.repeat(199)}😀...</div>`);
    });

    it('says so when there are no articles', () => {
      expect(renderTemplate('rss_summary', { items: [] })).toContain(
        '<div class="description">No articles available</div>'
      );
    });
  });

  describe('rss_feed_info', () => {
    it('renders the truncated description, item count and link', () => {
      const html = renderTemplate('rss_feed_info', {
        feed_title: 'News',
        feed_description: 'd'.repeat(160),
        feed_link: 'https://n.example.com',
        items: [{}, {}, {}],
      });

      expect(html).toContain(`<div class="description mb-md">${'d'.repeat(150)}...</div>`);
      expect(html).toContain('<div class="value value--large mb-md">3</div>');
      expect(html).toContain('<a href="https://n.example.com" target="_blank">Visit Feed</a>');
    });

    it('keeps descriptions of up to 150 characters, emoji included', () => {
      const exact = renderTemplate('rss_feed_info', { feed_description: 'd'.repeat(150) });
      const emoji = renderTemplate('rss_feed_info', { feed_description: '😀'.repeat(100) });

      expect(exact).toContain(`<div class="description mb-md">${'d'.repeat(150)}</div>`);
      expect(emoji).toContain(`<div class="description mb-md">${'😀'.repeat(100)}</div>`);
    });

    it('counts zero when items is missing', () => {
      expect(renderTemplate('rss_feed_info', {})).toContain(
        '<div class="value value--large mb-md">0</div>'
      );
    });
  });
});
