import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { Observable, map } from 'rxjs';
import { RESPONSE_MESSAGE_KEY } from '../decorators/response-message.decorator';

export type ResponseEnvelope<T> = {
  success: true;
  data: T;
  message: string;
};

const DEFAULT_MESSAGES: Record<string, string> = {
  POST: 'Created successfully.',
  PUT: 'Updated successfully.',
  PATCH: 'Updated successfully.',
  DELETE: 'Deleted successfully.',
};

@Injectable()
export class ResponseInterceptor<T>
  implements NestInterceptor<T, ResponseEnvelope<T>>
{
  private readonly reflector: Reflector;

  constructor(reflector?: Reflector) {
    this.reflector = reflector ?? new Reflector();
  }

  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ResponseEnvelope<T>> {
    const metaMessage = this.reflector.getAllAndOverride<string | undefined>(
      RESPONSE_MESSAGE_KEY,
      [context.getHandler(), context.getClass()],
    );
    const method = context.switchToHttp().getRequest<Request>()?.method ?? '';
    const message = metaMessage || DEFAULT_MESSAGES[method] || 'OK.';

    return next
      .handle()
      .pipe(
        map((data): ResponseEnvelope<T> => ({ success: true, data, message })),
      );
  }
}
