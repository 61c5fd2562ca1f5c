/**
 * Error thrown when a status name is not in the light status table.
 */
export class UnknownStatusError extends Error {
  readonly statusName: string;

  constructor(statusName: string) {
    super(`Unknown light status: ${JSON.stringify(statusName)}`);
    this.name = "UnknownStatusError";
    this.statusName = statusName;
  }
}

/**
 * Error thrown when a payload cannot be read back into a status envelope.
 */
export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a template layout cannot produce a usable stencil.
 */
export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}
