import { HttpException, HttpStatus } from '@nestjs/common';

import {
  BookingError,
  BookingErrorCode,
} from '../../domain/errors/booking-error';
import { Result } from '../../domain/model/result';

export const HTTP_STATUS_BY_CODE: Record<BookingErrorCode, HttpStatus> = {
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_FORMAT: HttpStatus.BAD_REQUEST,
  POLICY_VIOLATION: HttpStatus.UNPROCESSABLE_ENTITY,
  SLOT_TAKEN: HttpStatus.CONFLICT,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  INVALID_STATE: HttpStatus.CONFLICT,
  DEADLINE_PASSED: HttpStatus.UNPROCESSABLE_ENTITY,
  INVALID_STATUS: HttpStatus.BAD_REQUEST,
  LOCK_TIMEOUT: HttpStatus.SERVICE_UNAVAILABLE,
};

export interface BookingErrorBody {
  statusCode: number;
  code: BookingErrorCode;
  reason?: string;
  message: string;
}

export function toHttpException(error: BookingError): HttpException {
  const statusCode = HTTP_STATUS_BY_CODE[error.code];
  const body: BookingErrorBody = {
    statusCode,
    code: error.code,
    message: error.message,
  };
  if (error.code === 'POLICY_VIOLATION') {
    body.reason = error.reason;
  }
  return new HttpException(body, statusCode);
}

export function unwrap<T>(result: Result<T, BookingError>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}
