import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { InstrumentChangeError, LedgerError } from '../errors';
import { ErrorResponse } from '../interfaces/error-response.interface';

@Catch(LedgerError)
export class LedgerErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(LedgerErrorFilter.name);

  catch(exception: LedgerError, host: ArgumentsHost): void {
    const logPayload = {
      message: exception.message,
      code: exception.code,
      severity: exception.severity,
      metadata: exception.metadata,
    };
    if (exception.severity === 'warning') {
      this.logger.warn(logPayload);
    } else {
      this.logger.error({ ...logPayload, stack: exception.stack });
    }

    // Scheduler ticks and shutdown hooks have no response to build
    if (host.getType() !== 'http') {
      return;
    }

    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const statusCode = LedgerErrorFilter.statusFor(exception);

    const body: ErrorResponse = {
      statusCode,
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }

  static statusFor(exception: LedgerError): number {
    if (exception instanceof InstrumentChangeError) {
      return HttpStatus.CONFLICT;
    }
    return exception.severity === 'warning'
      ? HttpStatus.BAD_REQUEST
      : HttpStatus.INTERNAL_SERVER_ERROR;
  }
}
