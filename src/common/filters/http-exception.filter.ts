import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  LoggerService,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { FieldError } from '../errors';
import { getContext } from '../request-context';

const STATUS_CODES: Record<number, string> = {
  400: 'VALIDATION_ERROR',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  422: 'UNPROCESSABLE',
  429: 'RATE_LIMITED',
};

function isFieldError(value: unknown): value is FieldError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'field' in value &&
    typeof value.field === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

@Injectable()
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(@Inject(WINSTON_MODULE_NEST_PROVIDER) private logger: LoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const requestId = getContext()?.requestId;

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let errorCode = 'INTERNAL_ERROR';
    let errors: FieldError[] | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      errorCode = STATUS_CODES[status] ?? (status >= 500 ? 'INTERNAL_ERROR' : 'REQUEST_ERROR');
      const body = exception.getResponse();

      if (typeof body === 'string') {
        message = body;
      } else {
        if ('errorCode' in body && typeof body.errorCode === 'string') {
          errorCode = body.errorCode;
        }
        const bodyMessage = 'message' in body ? body.message : undefined;
        const bodyErrors = 'errors' in body ? body.errors : undefined;

        if (Array.isArray(bodyErrors)) {
          errors = bodyErrors.filter(isFieldError);
          message = typeof bodyMessage === 'string' ? bodyMessage : 'Validation failed';
        } else if (Array.isArray(bodyMessage)) {
          message = 'Validation failed';
          errors = bodyMessage.map((item) => ({
            field: typeof item === 'string' ? item : 'unknown',
            message: typeof item === 'string' ? item : 'Invalid value',
          }));
        } else {
          message = typeof bodyMessage === 'string' ? bodyMessage : exception.message;
        }
      }
    }

    const responseBody = {
      statusCode: status,
      message,
      errorCode,
      errors,
      timestamp: new Date().toISOString(),
      path: request.url,
      requestId,
    };

    if (status >= 500) {
      this.logger.error('request_error', {
        ...responseBody,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.warn('request_warning', responseBody);
    }

    response.status(status).json(responseBody);
  }
}
