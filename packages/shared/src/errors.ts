export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

const WS_CLOSE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 4000,
  [ErrorCode.NOT_FOUND]: 4001,
  [ErrorCode.UNAUTHORIZED]: 4002,
  [ErrorCode.FORBIDDEN]: 4003,
  [ErrorCode.VALIDATION]: 4004,
  [ErrorCode.RATE_LIMITED]: 4005,
  [ErrorCode.CONFLICT]: 4006,
  [ErrorCode.BAD_REQUEST]: 4007,
};

/** Close code a websocket is shut with when its connection fails with `code`. */
export function wsCloseCode(code: ErrorCode): number {
  return WS_CLOSE_MAP[code];
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly wsCloseCode: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.wsCloseCode = WS_CLOSE_MAP[code];
    this.safeMeta = safeMeta;
  }

  static validation(message: string, issues: ValidationIssue[]): AppError {
    return new AppError(ErrorCode.VALIDATION, message, { issues });
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

/**
 * Flattens zod-style issues (`path` as an array of keys) into the shape
 * exposed to clients.
 */
export function toValidationIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): ValidationIssue[] {
  return issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
}
