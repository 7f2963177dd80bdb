import { AxiosInstance } from "axios";
import { AcquisitionError, errorMessage } from "../errors";
import { isJsonObject } from "../interfaces/json";
import { RssFeed, RssPreviewRequest } from "../interfaces/rss";
import { RawData, WidgetConfig } from "../interfaces/widget";
import { logger } from "../logger";
import { classifyHttpFailure } from "../utils/httpFailure";
import { parseJsonBody } from "../utils/parseJson";
import { parseRssFeed } from "./rssParser";

export type RssAcquisitionOptions = {
  previewUrl: string;
  userAgent: string;
};

// -------------------------------------------------
// Tier 1: delegated preview service
// -------------------------------------------------
async function fetchFromPreview(
  axiosClient: AxiosInstance,
  config: WidgetConfig,
  previewUrl: string
): Promise<RawData> {
  const payload: RssPreviewRequest = {
    feed_url: config.endpointUrl,
    rss_config: config.feedOptions,
  };

  let body: string;
  try {
    const response = await axiosClient.post<string>(previewUrl, payload, {
      headers: { "Content-Type": "application/json" },
      timeout: config.timeoutSeconds * 1000,
      responseType: "text",
    });
    body = response.data;
  } catch (err) {
    throw new AcquisitionError(
      `RSS API request failed: ${errorMessage(err)}`,
      classifyHttpFailure(err)
    );
  }

  const data = parseJsonBody(body, "Invalid RSS API response");

  if (!isJsonObject(data) || !Object.prototype.hasOwnProperty.call(data, "feed")) {
    throw new AcquisitionError("RSS API request failed: Invalid RSS API response format", {
      kind: "invalid_response",
    });
  }

  return data["feed"];
}

// -------------------------------------------------
// Tier 3: fetch and parse the feed ourselves
// -------------------------------------------------
export async function fetchRssDirect(
  axiosClient: AxiosInstance,
  config: WidgetConfig,
  userAgent: string
): Promise<RssFeed> {
  let xml: unknown;
  try {
    const response = await axiosClient.get<string>(config.endpointUrl, {
      headers: {
        "User-Agent": userAgent,
        Accept: "application/rss+xml, application/xml, text/xml",
      },
      timeout: config.timeoutSeconds * 1000,
      responseType: "text",
    });
    xml = response.data;
  } catch (err) {
    throw new AcquisitionError(
      `RSS request failed: ${errorMessage(err)}`,
      classifyHttpFailure(err)
    );
  }

  if (typeof xml !== "string") {
    throw new AcquisitionError("RSS XML parsing failed: response body is not text", {
      kind: "parse",
      format: "xml",
    });
  }

  return parseRssFeed(xml, config.feedOptions);
}

/**
 * Acquire an `rss` widget's feed.
 *
 * The preview service is asked first. Only a connection failure reaching it
 * drops through to parsing the feed directly; every other failure is fatal.
 */
export async function fetchRssData(
  axiosClient: AxiosInstance,
  config: WidgetConfig,
  options: RssAcquisitionOptions
): Promise<RawData> {
  if (!config.endpointUrl) {
    throw new AcquisitionError("RSS feed URL is required", { kind: "invalid_request" });
  }

  try {
    return await fetchFromPreview(axiosClient, config, options.previewUrl);
  } catch (err) {
    if (err instanceof AcquisitionError && err.failure.kind === "connection") {
      logger.warn(
        { previewUrl: options.previewUrl, failure: err.failure },
        "RSS preview service unreachable, parsing feed directly"
      );
      return fetchRssDirect(axiosClient, config, options.userAgent);
    }
    throw err;
  }
}
