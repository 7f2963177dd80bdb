import { z } from "zod";
import { DEFAULT_TIMEOUT_SECONDS } from "../config";
import { WidgetConfig } from "../interfaces/widget";

/**
 * Feed options, forwarded verbatim to the preview service as `rss_config`.
 * `max_items` falls back to DEFAULT_MAX_FEED_ITEMS only where the feed is parsed locally.
 */
export const FeedOptionsSchema = z
  .object({
    max_items: z.number().int().positive().optional(),
    item_filter: z.string().optional(),
  })
  .passthrough();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// z.record rebuilds the object by assignment; the table is kept as parsed so
// every own key, "__proto__" included, reaches the mapper
const MappingTableSchema = z.custom<Record<string, unknown>>(isPlainObject, {
  message: "Expected an object",
});

/**
 * Serialized widget configuration as the dashboard sends it.
 */
export const WidgetConfigSchema = z.object({
  // anything but "rss" is an API widget
  data_source: z.enum(["api", "rss"]).catch("api"),
  api_url: z.string().default(""),
  api_headers: z.record(z.string()).nullish().transform((h) => h ?? {}),
  template_type: z.string().default("key_value"),
  data_mapping: MappingTableSchema.nullish().transform((m) => m ?? {}),
  rss_config: FeedOptionsSchema.nullish().transform((o) => o ?? {}),
  timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
});

export const TemplateIdSchema = z.enum([
  "key_value",
  "title_subtitle_value",
  "metric_grid",
  "weather_current",
  "time_display",
  "status_list",
  "icon_list",
  "text_block",
  "chart_simple",
  "image_caption",
  "rss_headlines",
  "rss_summary",
  "rss_feed_info",
]);

export type TemplateId = z.infer<typeof TemplateIdSchema>;

export function toWidgetConfig(
  input: z.infer<typeof WidgetConfigSchema>
): WidgetConfig {
  return {
    dataSource: input.data_source,
    endpointUrl: input.api_url.trim(),
    requestHeaders: input.api_headers,
    templateId: input.template_type,
    fieldMapping: input.data_mapping,
    feedOptions: input.rss_config,
    timeoutSeconds: input.timeout,
  };
}
