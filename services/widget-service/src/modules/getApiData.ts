import { AxiosInstance } from "axios";
import { AcquisitionError, errorMessage } from "../errors";
import { RawData, WidgetConfig } from "../interfaces/widget";
import { logger } from "../logger";
import { classifyHttpFailure } from "../utils/httpFailure";
import { parseJsonBody } from "../utils/parseJson";

function withUserAgent(
  headers: Record<string, string>,
  userAgent: string
): Record<string, string> {
  const hasUserAgent = Object.keys(headers).some(
    (name) => name.toLowerCase() === "user-agent"
  );
  return hasUserAgent ? { ...headers } : { ...headers, "User-Agent": userAgent };
}

/**
 * Fetch the raw JSON document of an `api` widget.
 * One GET, no retry: any failure is fatal for the render.
 */
export async function fetchApiData(
  axiosClient: AxiosInstance,
  config: WidgetConfig,
  userAgent: string
): Promise<RawData> {
  if (!config.endpointUrl) {
    throw new AcquisitionError("API URL is required", { kind: "invalid_request" });
  }

  try {
    const response = await axiosClient.get<string>(config.endpointUrl, {
      headers: withUserAgent(config.requestHeaders, userAgent),
      timeout: config.timeoutSeconds * 1000,
      responseType: "text",
    });

    return parseJsonBody(response.data, "Invalid JSON response");
  } catch (err) {
    if (err instanceof AcquisitionError) throw err;

    const failure = classifyHttpFailure(err);
    logger.warn({ url: config.endpointUrl, failure }, "Widget API request failed");

    throw new AcquisitionError(`API request failed: ${errorMessage(err)}`, failure);
  }
}
