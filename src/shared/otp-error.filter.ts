import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { OtpError, OtpErrorCode } from './otp-error';

export const OTP_ERROR_STATUS: Record<OtpErrorCode, HttpStatus> = {
  InvalidUri: HttpStatus.BAD_REQUEST,
  MissingField: HttpStatus.BAD_REQUEST,
  InvalidSecret: HttpStatus.BAD_REQUEST,
  InvalidAlgorithm: HttpStatus.BAD_REQUEST,
  InvalidDigits: HttpStatus.BAD_REQUEST,
  InvalidPeriod: HttpStatus.BAD_REQUEST,
  InvalidCounter: HttpStatus.BAD_REQUEST,
  MalformedRecord: HttpStatus.BAD_REQUEST,
  WeakPassword: HttpStatus.BAD_REQUEST,
  PasswordMismatch: HttpStatus.BAD_REQUEST,
  CodeGenerationError: HttpStatus.BAD_REQUEST,
  DecryptionFailure: HttpStatus.UNAUTHORIZED,
  SessionLocked: HttpStatus.UNAUTHORIZED,
  CredentialNotFound: HttpStatus.NOT_FOUND,
  NotInitialized: HttpStatus.CONFLICT,
  AlreadyInitialized: HttpStatus.CONFLICT,
  CredentialExists: HttpStatus.CONFLICT,
  PartialReencryptionFailure: HttpStatus.CONFLICT,
  IoFailure: HttpStatus.INTERNAL_SERVER_ERROR,
  QrUnavailable: HttpStatus.NOT_IMPLEMENTED,
};

const PUBLIC_DETAIL_CODES: ReadonlySet<OtpErrorCode> = new Set<OtpErrorCode>([
  'PartialReencryptionFailure',
  'CredentialExists',
  'CredentialNotFound',
]);

export interface OtpErrorResponseBody {
  statusCode: number;
  error: OtpErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Maps {@link OtpError} to an HTTP response. Details are only sent for errors that
 * carry file names (`PartialReencryptionFailure`, `CredentialExists`, `CredentialNotFound`).
 */
@Catch(OtpError)
export class OtpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(OtpErrorFilter.name);

  catch(exception: OtpError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = OTP_ERROR_STATUS[exception.code];

    if (statusCode === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
    }

    response.status(statusCode).json(OtpErrorFilter.toBody(exception));
  }

  static toBody(exception: OtpError): OtpErrorResponseBody {
    const statusCode = OTP_ERROR_STATUS[exception.code];
    const body: OtpErrorResponseBody = { statusCode, error: exception.code, message: exception.message };

    if (exception.details && PUBLIC_DETAIL_CODES.has(exception.code)) {
      body.details = exception.details;
    }

    return body;
  }
}
