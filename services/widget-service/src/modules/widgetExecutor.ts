import axios, { AxiosInstance } from "axios";
import { Env, loadEnv } from "../config";
import { AcquisitionError, ConfigError, errorMessage } from "../errors";
import { Fragment, RawData, WidgetConfig } from "../interfaces/widget";
import { logger } from "../logger";
import { WidgetConfigSchema, toWidgetConfig } from "../schemas/widgetConfig.schema";
import { errorFragment, renderTemplate } from "../templates";
import { formatIssues } from "../utils/zodIssues";
import { applyMapping } from "./applyMapping";
import { fetchApiData } from "./getApiData";
import { fetchRssData } from "./getRssData";

export type WidgetExecutorDeps = {
  axiosClient: AxiosInstance;
  previewUrl: string;
  apiUserAgent: string;
  rssUserAgent: string;
};

export class WidgetExecutor {
  constructor(private readonly deps: WidgetExecutorDeps) {}

  /**
   * Config → acquisition → mapping → template. Always resolves to a fragment.
   */
  async execute(input: unknown): Promise<Fragment> {
    try {
      const config = this.parseConfig(input);
      const raw = await this.acquire(config);
      const mapped = applyMapping(raw, config.fieldMapping);

      logger.debug(
        { templateId: config.templateId, fields: Object.keys(mapped) },
        "Rendering widget"
      );

      return renderTemplate(config.templateId, mapped);
    } catch (err) {
      logger.error(
        {
          message: errorMessage(err),
          failure: err instanceof AcquisitionError ? err.failure : undefined,
        },
        "Widget execution failed"
      );
      return errorFragment(`Widget execution failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Same as `execute`, starting from the serialized configuration.
   */
  async executeJson(json: string): Promise<Fragment> {
    let input: unknown;
    try {
      input = JSON.parse(json);
    } catch (err) {
      logger.error({ message: errorMessage(err) }, "Invalid JSON configuration");
      return errorFragment(`Invalid JSON configuration: ${errorMessage(err)}`);
    }
    return this.execute(input);
  }

  private parseConfig(input: unknown): WidgetConfig {
    const parsed = WidgetConfigSchema.safeParse(input);

    if (!parsed.success) {
      throw new ConfigError(
        `Invalid widget configuration: ${formatIssues(parsed.error.issues, "config")}`,
        parsed.error.issues
      );
    }

    return toWidgetConfig(parsed.data);
  }

  private acquire(config: WidgetConfig): Promise<RawData> {
    if (config.dataSource === "rss") {
      logger.debug({ feedUrl: config.endpointUrl }, "Acquiring RSS feed");
      return fetchRssData(this.deps.axiosClient, config, {
        previewUrl: this.deps.previewUrl,
        userAgent: this.deps.rssUserAgent,
      });
    }

    logger.debug({ url: config.endpointUrl }, "Acquiring API data");
    return fetchApiData(this.deps.axiosClient, config, this.deps.apiUserAgent);
  }
}

export function createWidgetExecutor(env: Env = loadEnv()): WidgetExecutor {
  return new WidgetExecutor({
    axiosClient: axios.create(),
    previewUrl: env.RSS_PREVIEW_URL,
    apiUserAgent: env.WIDGET_USER_AGENT,
    rssUserAgent: env.RSS_USER_AGENT,
  });
}
