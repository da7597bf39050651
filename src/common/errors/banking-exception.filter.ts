import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { Response } from 'express';
import { LoggingService } from '../monitoring/logging.service';
import {
  BankingError,
  BankingErrorCode,
  RequestValidationError,
} from './banking.errors';

export interface ErrorResponseBody {
  error: string;
  message: string;
  errorCode: BankingErrorCode;
}

const STATUS_BY_CODE: Record<BankingErrorCode, HttpStatus> = {
  ACCOUNT_NOT_FOUND: HttpStatus.NOT_FOUND,
  TRANSACTION_NOT_FOUND: HttpStatus.NOT_FOUND,
  ACCOUNT_ALREADY_EXISTS: HttpStatus.CONFLICT,
  INVALID_BALANCE: HttpStatus.BAD_REQUEST,
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  INVALID_TRANSACTION: HttpStatus.BAD_REQUEST,
  INSUFFICIENT_BALANCE: HttpStatus.BAD_REQUEST,
  STORAGE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(error: BankingError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

export function toErrorResponseBody(error: BankingError): ErrorResponseBody {
  return {
    error: HttpStatus[httpStatusFor(error)],
    message: error.message,
    errorCode: error.code,
  };
}

/**
 * `ValidationPipe` exception factory: one `field: constraint` entry per
 * failed constraint, so DTO failures share the banking error body.
 */
export function toRequestValidationError(
  errors: ReadonlyArray<{
    property: string;
    constraints?: Record<string, string>;
  }>,
): RequestValidationError {
  const message = errors
    .flatMap(error =>
      Object.values(error.constraints ?? {}).map(
        constraint => `${error.property}: ${constraint}`,
      ),
    )
    .join(', ');
  return new RequestValidationError(message);
}

@Catch(BankingError)
export class BankingExceptionFilter implements ExceptionFilter<BankingError> {
  constructor(private readonly loggingService: LoggingService) {}

  catch(exception: BankingError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = httpStatusFor(exception);

    if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.loggingService.error(
        `Unhandled storage failure: ${exception.message}`,
        { errorCode: exception.code, stack: exception.stack },
      );
    } else {
      this.loggingService.warn(exception.message, { errorCode: exception.code });
    }

    response.status(status).json(toErrorResponseBody(exception));
  }
}
