export { loadEnv } from "./config";
export type { Env } from "./config";
export * from "./errors";
export type { JsonValue, JsonObject } from "./interfaces/json";
export type { RssFeed, RssItem } from "./interfaces/rss";
export type { Fragment, MappedData, RawData, WidgetConfig } from "./interfaces/widget";
export { applyMapping, materialize, resolveFields } from "./modules/applyMapping";
export type { FieldMappingEntry } from "./modules/applyMapping";
export { fetchApiData } from "./modules/getApiData";
export { fetchRssData, fetchRssDirect } from "./modules/getRssData";
export { resolvePath } from "./modules/pathResolver";
export { parseRssFeed } from "./modules/rssParser";
export { WidgetExecutor, createWidgetExecutor } from "./modules/widgetExecutor";
export { TemplateIdSchema, WidgetConfigSchema } from "./schemas/widgetConfig.schema";
export type { TemplateId } from "./schemas/widgetConfig.schema";
export { TEMPLATE_RENDERERS, errorFragment, renderTemplate } from "./templates";
export type { TemplateRenderer } from "./templates";
