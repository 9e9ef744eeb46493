/**
 * Base class for failures while talking to the Gamma API.
 */
export class GammaError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GammaError";
    this.code = code;
  }
}

export class GammaHttpError extends GammaError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, code = `gamma_http_${status}`) {
    super(`HTTP ${status} from ${url}`, code);
    this.name = "GammaHttpError";
    this.status = status;
    this.url = url;
  }
}

export class GammaNotFoundError extends GammaHttpError {
  constructor(url: string) {
    super(404, url, "gamma_not_found");
    this.name = "GammaNotFoundError";
  }
}

/** Network failure or timeout before any response arrived. */
export class GammaRequestError extends GammaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "gamma_request_failed", options);
    this.name = "GammaRequestError";
  }
}

/** Body was not JSON, or not shaped like a list of events. */
export class GammaResponseError extends GammaError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "gamma_bad_response", options);
    this.name = "GammaResponseError";
  }
}
