import { TemplateError, errorMessage } from '../errors';
import { Fragment, MappedData } from '../interfaces/widget';
import { logger } from '../logger';
import { TemplateId, TemplateIdSchema } from '../schemas/widgetConfig.schema';
import {
  renderChartSimple,
  renderImageCaption,
  renderKeyValue,
  renderTextBlock,
  renderTimeDisplay,
  renderTitleSubtitleValue,
  renderWeatherCurrent,
} from './basic';
import { errorFragment } from './errorFragment';
import { renderIconList, renderMetricGrid, renderStatusList } from './lists';
import { renderRssFeedInfo, renderRssHeadlines, renderRssSummary } from './rss';

export type TemplateRenderer = (data: MappedData) => Fragment;

export const TEMPLATE_RENDERERS = {
  key_value: renderKeyValue,
  title_subtitle_value: renderTitleSubtitleValue,
  metric_grid: renderMetricGrid,
  weather_current: renderWeatherCurrent,
  time_display: renderTimeDisplay,
  status_list: renderStatusList,
  icon_list: renderIconList,
  text_block: renderTextBlock,
  chart_simple: renderChartSimple,
  image_caption: renderImageCaption,
  rss_headlines: renderRssHeadlines,
  rss_summary: renderRssSummary,
  rss_feed_info: renderRssFeedInfo,
} satisfies Record<TemplateId, TemplateRenderer>;

/**
 * Render mapped data with the named template.
 *
 * Never throws: unknown ids, data the template cannot lay out and any
 * unexpected renderer failure come back as an error fragment.
 */
export function renderTemplate(templateId: string, data: MappedData): Fragment {
  try {
    const parsed = TemplateIdSchema.safeParse(templateId);
    if (!parsed.success) {
      throw new TemplateError(`Unknown template type: ${templateId}`);
    }
    return TEMPLATE_RENDERERS[parsed.data](data);
  } catch (err) {
    if (err instanceof TemplateError) {
      logger.warn({ templateId, reason: err.message }, 'Template could not be rendered');
      return errorFragment(err.message);
    }

    logger.error({ templateId, message: errorMessage(err) }, 'Template renderer failed');
    return errorFragment(`Template rendering failed: ${errorMessage(err)}`);
  }
}

export { errorFragment };
