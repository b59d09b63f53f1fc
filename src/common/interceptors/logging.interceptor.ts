import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  LoggerService,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { getContext } from '../request-context';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(@Inject(WINSTON_MODULE_NEST_PROVIDER) private logger: LoggerService) {}

  intercept<T>(context: ExecutionContext, next: CallHandler<T>): Observable<T> {
    const http = context.switchToHttp();
    const { method, originalUrl } = http.getRequest<Request>();
    const start = Date.now();

    return next.handle().pipe(
      tap(() => {
        const store = getContext();
        this.logger.log('request', {
          method,
          path: originalUrl,
          statusCode: http.getResponse<Response>().statusCode,
          duration: Date.now() - start,
          principalId: store?.principalId,
          role: store?.role,
          branchId: store?.branchId,
          requestId: store?.requestId,
        });
      }),
    );
  }
}
