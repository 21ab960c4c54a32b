import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { Observable, map } from 'rxjs';

export const RESPONSE_MESSAGE = 'response_message';

export type ApiResponse<T> = {
  success: true;
  data: T;
  message: string;
};

function payloadMessage(data: unknown): string {
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return '';
}

function defaultMessage(method: string): string {
  switch (method) {
    case 'POST':
      return 'Created successfully.';
    case 'PATCH':
    case 'PUT':
      return 'Updated successfully.';
    case 'DELETE':
      return 'Deleted successfully.';
    default:
      return 'OK.';
  }
}

@Injectable()
export class ResponseInterceptor<T = unknown> implements NestInterceptor<T, ApiResponse<T>> {
  private readonly reflector: Reflector;

  constructor(reflector?: Reflector) {
    this.reflector = reflector ?? new Reflector();
  }

  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<ApiResponse<T>> {
    return next.handle().pipe(
      map((data) => {
        const metaMessage = this.reflector.getAllAndOverride<string | undefined>(
          RESPONSE_MESSAGE,
          [context.getHandler(), context.getClass()],
        );
        const method = context.switchToHttp().getRequest<Request>().method;

        return {
          success: true,
          data,
          message: metaMessage || payloadMessage(data) || defaultMessage(method),
        };
      }),
    );
  }
}
