/**
 * Error taxonomy for a notifier run.
 *
 * Nothing in the pipeline catches these: a failed run surfaces to the
 * scheduler with persisted state untouched.
 */

export class NotifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Non-success status or network failure from an upstream service or the webhook. */
export class UpstreamUnavailableError extends NotifierError {
  service: string;
  url: string;
  status: number | null;

  constructor(service: string, url: string, status: number | null, detail?: string) {
    super(
      status === null
        ? `${service} unreachable at ${url}${detail ? `: ${detail}` : ""}`
        : `${service} returned HTTP ${status} for ${url}${detail ? `: ${detail}` : ""}`
    );
    this.service = service;
    this.url = url;
    this.status = status;
  }
}

export class NotFoundError extends NotifierError {
  key: string;

  constructor(key: string) {
    super(`Object not found in storage: ${key}`);
    this.key = key;
  }
}

/** Upstream returned JSON of an unexpected shape. */
export class MalformedResponseError extends NotifierError {
  service: string;

  constructor(service: string, detail: string) {
    super(`Malformed response from ${service}: ${detail}`);
    this.service = service;
  }
}

export class ConfigurationError extends NotifierError {}
