import { isAxiosError } from "axios";
import { AcquisitionFailure } from "../errors";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  // socket-level connect timeout; axios's own timeout is ECONNABORTED
  "ETIMEDOUT",
]);

const TIMEOUT_CODES = new Set(["ECONNABORTED"]);

/**
 * Tag an HTTP client error with the kind of failure it represents.
 */
export function classifyHttpFailure(err: unknown): AcquisitionFailure {
  if (!isAxiosError(err)) {
    return { kind: "unknown" };
  }

  if (err.response) {
    return { kind: "http", status: err.response.status };
  }

  const code = err.code ?? "";

  if (TIMEOUT_CODES.has(code)) {
    return { kind: "timeout" };
  }

  if (CONNECTION_CODES.has(code) || code === "ERR_NETWORK") {
    return { kind: "connection", code };
  }

  return { kind: "unknown" };
}
