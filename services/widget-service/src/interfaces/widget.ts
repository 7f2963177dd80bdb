import { JsonValue } from './json';

export type DataSource = 'api' | 'rss';

export interface FeedOptions {
  max_items?: number;
  item_filter?: string;
  [option: string]: unknown;
}

/**
 * One render's configuration, normalized from the wire format.
 */
export interface WidgetConfig {
  dataSource: DataSource;
  endpointUrl: string;
  requestHeaders: Record<string, string>;
  templateId: string;
  fieldMapping: Record<string, unknown>;
  feedOptions: FeedOptions;
  timeoutSeconds: number;
}

/** Acquired, untrusted data the mapping table is resolved against. */
export type RawData = JsonValue;

/** Field name → resolved value; `null` when the field could not be resolved. */
export type MappedData = Record<string, JsonValue>;

export type Fragment = string;
