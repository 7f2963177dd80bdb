import { AcquisitionError, errorMessage } from "../errors";
import { JsonValue, isJsonValue } from "../interfaces/json";

/**
 * Decode a response body requested as text.
 */
export function parseJsonBody(body: unknown, label: string): JsonValue {
  if (typeof body !== "string") {
    // Already decoded by the HTTP client
    if (isJsonValue(body)) return body;

    throw new AcquisitionError(`${label}: unsupported response body`, {
      kind: "parse",
      format: "json",
    });
  }

  try {
    const parsed: JsonValue = JSON.parse(body);
    return parsed;
  } catch (err) {
    throw new AcquisitionError(`${label}: ${errorMessage(err)}`, {
      kind: "parse",
      format: "json",
    });
  }
}
