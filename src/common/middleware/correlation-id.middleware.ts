import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { asyncLocalStorage, RequestContext } from '../logger/request-context';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

const ACCEPTED_CORRELATION_ID = /^[A-Za-z0-9._-]{1,64}$/;

export function resolveCorrelationId(header: string | string[] | undefined): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  return candidate && ACCEPTED_CORRELATION_ID.test(candidate) ? candidate : uuidv4();
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId = resolveCorrelationId(req.headers[CORRELATION_ID_HEADER.toLowerCase()]);

    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const context: RequestContext = {
      correlationId,
      method: req.method,
      path: req.originalUrl,
      ip: req.ip || req.socket?.remoteAddress,
    };

    asyncLocalStorage.run(context, () => {
      next();
    });
  }
}
