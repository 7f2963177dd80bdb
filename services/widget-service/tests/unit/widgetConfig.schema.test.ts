import { WidgetConfigSchema, toWidgetConfig } from '@/schemas/widgetConfig.schema';
import { loadEnv } from '@/config';
import { ConfigError } from '@/errors';

describe('WidgetConfigSchema (unit)', () => {
  it('fills every default for an empty object', () => {
    expect(toWidgetConfig(WidgetConfigSchema.parse({}))).toEqual({
      dataSource: 'api',
      endpointUrl: '',
      requestHeaders: {},
      templateId: 'key_value',
      fieldMapping: {},
      feedOptions: {},
      timeoutSeconds: 30,
    });
  });

  it('treats null headers, mapping and feed options as empty', () => {
    const config = toWidgetConfig(
      WidgetConfigSchema.parse({ api_headers: null, data_mapping: null, rss_config: null })
    );

    expect(config.requestHeaders).toEqual({});
    expect(config.fieldMapping).toEqual({});
    expect(config.feedOptions).toEqual({});
  });

  it('keeps feed options as given, unknown ones included', () => {
    const parsed = WidgetConfigSchema.parse({ rss_config: { item_filter: 'today', language: 'en' } });

    expect(parsed.rss_config).toEqual({ item_filter: 'today', language: 'en' });
  });

  it('reads any data_source other than "rss" as "api"', () => {
    expect(WidgetConfigSchema.parse({ data_source: 'ftp' }).data_source).toBe('api');
    expect(WidgetConfigSchema.parse({ data_source: 'rss' }).data_source).toBe('rss');
  });

  it('keeps the mapping table as parsed, "__proto__" key included', () => {
    const parsed = WidgetConfigSchema.parse(JSON.parse('{"data_mapping": {"__proto__": "a", "b": "b"}}'));

    expect(Object.keys(parsed.data_mapping)).toEqual(['__proto__', 'b']);
  });

  it('rejects a mapping table that is not an object', () => {
    expect(WidgetConfigSchema.safeParse({ data_mapping: ['a'] }).success).toBe(false);
  });

  it('trims the endpoint URL', () => {
    expect(toWidgetConfig(WidgetConfigSchema.parse({ api_url: ' https://x.test ' })).endpointUrl).toBe(
      'https://x.test'
    );
  });

  it('rejects a non-positive timeout and non-string headers', () => {
    expect(WidgetConfigSchema.safeParse({ timeout: 0 }).success).toBe(false);
    expect(WidgetConfigSchema.safeParse({ api_headers: { 'X-Count': 3 } }).success).toBe(false);
  });
});

describe('loadEnv (unit)', () => {
  it('applies defaults', () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: 'production',
      RSS_PREVIEW_URL: 'http://localhost:8080/api/rss/preview',
      WIDGET_USER_AGENT: 'E-Paper-Dashboard/1.0',
      RSS_USER_AGENT: 'E-Paper-Dashboard/1.0 RSS Reader',
    });
  });

  it('accepts any NODE_ENV', () => {
    expect(loadEnv({ NODE_ENV: 'staging' }).NODE_ENV).toBe('staging');
  });

  it('rejects a malformed preview URL with a ConfigError', () => {
    expect(() => loadEnv({ RSS_PREVIEW_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => loadEnv({ RSS_PREVIEW_URL: 'not a url' })).toThrow(
      'Invalid environment: RSS_PREVIEW_URL: Invalid url'
    );
  });
});
