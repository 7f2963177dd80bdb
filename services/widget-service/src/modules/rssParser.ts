import { XMLParser, XMLValidator } from "fast-xml-parser";
import { AcquisitionError } from "../errors";
import { FeedOptions } from "../interfaces/widget";
import { RssFeed, RssItem } from "../interfaces/rss";
import { stripHtmlTags } from "../utils/html";
import { DEFAULT_MAX_FEED_ITEMS } from "../config";

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  // <rss><channel><item>: a lone item must still come back as a list
  isArray: (tagName, jPath) => {
    const depth = jPath.split(".").length;
    return (tagName === "channel" && depth === 2) || (tagName === "item" && depth === 3);
  },
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text content of the first `tag` child, or "" when the element is missing.
 */
function getElementText(parent: XmlNode, tag: string): string {
  const raw = parent[tag];
  const element = Array.isArray(raw) ? raw[0] : raw;

  if (typeof element === "string") return element.trim();
  if (typeof element === "number" || typeof element === "boolean") return String(element);
  if (isXmlNode(element) && typeof element["#text"] === "string") {
    return element["#text"].trim();
  }
  return "";
}

function toRssItem(node: unknown): RssItem {
  const item = isXmlNode(node) ? node : {};

  return {
    title: getElementText(item, "title"),
    description: stripHtmlTags(getElementText(item, "description")),
    link: getElementText(item, "link"),
    pub_date: getElementText(item, "pubDate"),
    author: getElementText(item, "author"),
    guid: getElementText(item, "guid"),
  };
}

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/**
 * Does an item pass the configured `item_filter`?
 *
 * `latest` keeps everything, `today` and `thisweek` look at the publication
 * date, any other text is a case-insensitive keyword match.
 */
export function matchesItemFilter(item: RssItem, filter: string, now = new Date()): boolean {
  const normalized = filter.trim().toLowerCase();
  if (!normalized || normalized === "latest") return true;

  if (normalized === "today" || normalized === "thisweek" || normalized === "week") {
    const published = Date.parse(item.pub_date);
    if (Number.isNaN(published)) return false;

    if (normalized === "today") {
      return startOfDay(new Date(published)) === startOfDay(now);
    }

    const weekStart = now.getTime() - now.getDay() * 24 * 60 * 60 * 1000;
    return published > weekStart;
  }

  return (
    item.title.toLowerCase().includes(normalized) ||
    item.description.toLowerCase().includes(normalized)
  );
}

/**
 * Parse an RSS 2.0 document into the same shape the preview service returns.
 */
export function parseRssFeed(xml: string, options: Partial<FeedOptions> = {}): RssFeed {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new AcquisitionError(
      `RSS XML parsing failed: ${validation.err.msg} (line ${validation.err.line})`,
      { kind: "parse", format: "xml" }
    );
  }

  const document: unknown = parser.parse(xml);
  // Processing instructions (<?xml-stylesheet ...?>) come back as "?"-prefixed keys
  const rootName = isXmlNode(document)
    ? Object.keys(document).find((key) => !key.startsWith("?"))
    : undefined;

  if (!isXmlNode(document) || rootName === undefined) {
    throw new AcquisitionError("RSS XML parsing failed: no root element", {
      kind: "parse",
      format: "xml",
    });
  }

  const root = document[rootName];
  const channels = isXmlNode(root) ? root["channel"] : undefined;

  if (!Array.isArray(channels) || channels.length === 0) {
    throw new AcquisitionError("Invalid RSS format: no channel element found", {
      kind: "invalid_response",
    });
  }

  const channel: XmlNode = isXmlNode(channels[0]) ? channels[0] : {};
  const rawItems = Array.isArray(channel["item"]) ? channel["item"] : [];
  const maxItems = options.max_items ?? DEFAULT_MAX_FEED_ITEMS;
  const filter = options.item_filter ?? "";

  const items = rawItems
    .map(toRssItem)
    .filter((item) => matchesItemFilter(item, filter))
    .slice(0, maxItems);

  return {
    title: getElementText(channel, "title"),
    description: getElementText(channel, "description"),
    link: getElementText(channel, "link"),
    items,
  };
}
