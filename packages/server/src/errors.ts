/** Request body failed schema validation. `details` maps field path → message. */
export class RequestValidationError extends Error {
  readonly status = 422;

  constructor(readonly details: Record<string, string>) {
    super("Validation failed");
    this.name = "RequestValidationError";
  }
}

export class RouteNotFoundError extends Error {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = "RouteNotFoundError";
  }
}
