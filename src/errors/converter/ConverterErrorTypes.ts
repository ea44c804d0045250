export class ConverterError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = "CONVERTER_ERROR";
    this.statusCode = statusCode;
  }
}

export class EmptyHtmlInputError extends ConverterError {
  constructor() {
    super("HTML text was not provided", 400);
    this.name = "EMPTY_HTML_INPUT_ERROR";
  }
}

export class InvalidLineNumberError extends ConverterError {
  constructor(value: string) {
    super(`INVALID_LINE_NUMBER: ${value}`, 400);
    this.name = "INVALID_LINE_NUMBER_ERROR";
  }
}

export class SessionNotFoundError extends ConverterError {
  constructor(sessionId: string) {
    super(`MAPPING_SESSION_NOT_FOUND: ${sessionId}`, 404);
    this.name = "SESSION_NOT_FOUND_ERROR";
  }
}
