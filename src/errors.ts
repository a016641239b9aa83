export class ShipgaugeError extends Error {
  constructor(
    message: string,
    public readonly code: string = "INTERNAL_ERROR",
  ) {
    super(message);
    this.name = "ShipgaugeError";
  }
}

/** Non-2xx response that is not worth retrying (bad query, server fault). Status 0 means no response at all. */
export class ApiError extends ShipgaugeError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string,
  ) {
    super(
      status === 0
        ? `Request to ${url} failed: ${body}`
        : `API error ${status} from ${url}: ${truncate(body)}`,
      "API_ERROR",
    );
    this.name = "ApiError";
  }
}

export class AuthError extends ShipgaugeError {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`Authentication rejected (${status}) by ${url}`, "AUTH_FAILED");
    this.name = "AuthError";
  }
}

export class RateLimitError extends ShipgaugeError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
  ) {
    super(`Rate limit still exceeded for ${url} after ${attempts} attempts`, "RATE_LIMITED");
    this.name = "RateLimitError";
  }
}

export class NotFoundError extends ShipgaugeError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class CacheCorruptError extends ShipgaugeError {
  constructor(path: string, reason: string) {
    super(`Cache artifact ${path} is unreadable: ${reason}`, "CACHE_CORRUPT");
    this.name = "CacheCorruptError";
  }
}

export class ConfigError extends ShipgaugeError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

function truncate(text: string, max = 300): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
