/**
 * Failure taxonomy of the widget pipeline.
 *
 * PathError stays inside the mapping stage (one field degrades to null);
 * AcquisitionError, TemplateError and ConfigError reach the executor boundary
 * and become an error fragment.
 */

export class WidgetError extends Error {
  constructor(message: string, public readonly code = 'WIDGET_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'WidgetError';
  }
}

/**
 * Why an acquisition attempt failed, tagged where the HTTP call is made
 * so callers never have to inspect message text.
 */
export type AcquisitionFailure =
  | { kind: 'connection'; code?: string }
  | { kind: 'timeout' }
  | { kind: 'http'; status: number }
  | { kind: 'parse'; format: 'json' | 'xml' }
  | { kind: 'invalid_response' }
  | { kind: 'invalid_request' }
  | { kind: 'unknown' };

export class AcquisitionError extends WidgetError {
  constructor(message: string, public readonly failure: AcquisitionFailure, details?: unknown) {
    super(message, 'ACQUISITION_ERROR', details);
    this.name = 'AcquisitionError';
  }
}

export class PathError extends WidgetError {
  constructor(message: string, public readonly path: string) {
    super(message, 'PATH_ERROR');
    this.name = 'PathError';
  }
}

export class TemplateError extends WidgetError {
  constructor(message: string, details?: unknown) {
    super(message, 'TEMPLATE_ERROR', details);
    this.name = 'TemplateError';
  }
}

export class ConfigError extends WidgetError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
