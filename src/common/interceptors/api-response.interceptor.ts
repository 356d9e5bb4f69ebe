import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export type ApiResponse<T> = { data: T } & Record<string, unknown>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Wraps bare handler results in `{ data }`; envelopes (`{ data, pagination }`) pass through. */
export function toApiResponse(body: unknown): ApiResponse<unknown> {
  if (isObject(body) && 'data' in body) return { ...body, data: body.data };
  return { data: body };
}

@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<ApiResponse<unknown>> {
    return next.handle().pipe(map((body: unknown) => toApiResponse(body)));
  }
}
