import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface ApiEnvelope<T> {
  success: boolean;
  data?: T;
}

const isEnvelope = (data: unknown): data is ApiEnvelope<unknown> =>
  typeof data === 'object' &&
  data !== null &&
  Object.prototype.hasOwnProperty.call(data, 'success');

@Injectable()
export class ResponseInterceptor
  implements NestInterceptor<unknown, ApiEnvelope<unknown>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>,
  ): Observable<ApiEnvelope<unknown>> {
    return next.handle().pipe(
      map((data) => {
        // Already in standardized shape, pass through
        if (isEnvelope(data)) {
          return data;
        }

        return { success: true, data };
      }),
    );
  }
}
