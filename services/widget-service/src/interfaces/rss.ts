// Type aliases (not interfaces) so a parsed feed is assignable to JsonObject.
export type RssItem = {
  title: string;
  description: string;
  link: string;
  pub_date: string;
  author: string;
  guid: string;
};

export type RssFeed = {
  title: string;
  description: string;
  link: string;
  items: RssItem[];
};

/** Body POSTed to the RSS preview service. */
export interface RssPreviewRequest {
  feed_url: string;
  rss_config: Record<string, unknown>;
}
