import type { FailureCategory } from "@chamapool/shared";

export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

const CATEGORY_STATUS: Record<FailureCategory, number> = {
  authorization: 403,
  precondition: 409,
  value_mismatch: 422,
  capacity: 409,
  integrity: 409,
};

export function fail(category: FailureCategory, code: string, message: string, status?: number): HttpError {
  return new HttpError(status ?? CATEGORY_STATUS[category], code, message, { category });
}

export function ensure(
  condition: unknown,
  category: FailureCategory,
  code: string,
  message: string,
  status?: number
): asserts condition {
  if (!condition) {
    throw fail(category, code, message, status);
  }
}
