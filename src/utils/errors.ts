export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code?: string) {
    super(400, message, code);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(404, message, code);
    this.name = 'NotFoundError';
  }
}

export class UnprocessableEntityError extends AppError {
  constructor(message: string, code?: string) {
    super(422, message, code);
    this.name = 'UnprocessableEntityError';
  }
}

export class BadGatewayError extends AppError {
  constructor(message: string = 'Upstream service failed', code?: string) {
    super(502, message, code);
    this.name = 'BadGatewayError';
  }
}
