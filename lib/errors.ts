/**
 * Domain errors
 *
 * None of these escape the classification path: verifier adapters catch
 * ProviderUnavailableError and its subclasses and turn them into an
 * `unknown` verdict.
 */

/**
 * A provider could not give a usable answer (timeout, non-200, bad payload)
 */
export class ProviderUnavailableError extends Error {
  readonly provider: string;
  readonly diagnostics: Record<string, unknown>;

  constructor(provider: string, message: string, diagnostics: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
    this.diagnostics = diagnostics;
  }
}

/**
 * Outbound call exceeded its timeout
 */
export class HttpTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${new URL(url).host} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Outbound call answered with a non-2xx status
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/**
 * A setting required by the current code path is absent
 */
export class ConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string) {
    super(`${setting} is not configured`);
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

/**
 * Telegram Bot API answered with ok=false or a non-2xx status
 */
export class TelegramApiError extends Error {
  readonly method: string;
  readonly errorCode?: number;

  constructor(method: string, description: string, errorCode?: number) {
    super(`Telegram ${method} failed: ${description}`);
    this.name = 'TelegramApiError';
    this.method = method;
    this.errorCode = errorCode;
  }
}

/**
 * Diagnostics map for an error caught at a provider boundary
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof ProviderUnavailableError) {
    return { error: error.message, ...error.diagnostics };
  }
  if (error instanceof HttpStatusError) {
    return { error: error.message, http: error.status };
  }
  if (error instanceof HttpTimeoutError) {
    return { error: error.message, timeoutMs: error.timeoutMs };
  }
  if (error instanceof Error) {
    return { error: error.message };
  }
  return { error: String(error) };
}
