import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export type ApiResponse<T> = { data: T } & Record<string, unknown>;

function isEnvelope(value: unknown): value is ApiResponse<unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'data' in value;
}

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      // Handlers that already build { data, pagination | redirect } pass through untouched.
      map((body: unknown) => (isEnvelope(body) ? body : { data: body ?? null })),
    );
  }
}
