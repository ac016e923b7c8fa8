import {
  ArgumentsHost,
  Catch,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { Request, Response } from 'express';
import { buildErrorPage } from '../polls/formatters/error-page.formatter';

const VISITOR_PREFIX = '/polls';

export function isVisitorPath(path: string): boolean {
  return path === VISITOR_PREFIX || path.startsWith(`${VISITOR_PREFIX}/`);
}

/**
 * Renders errors under /polls as HTML pages, router-level 404s included.
 * Other paths keep Nest's default JSON body.
 */
@Catch()
export class HtmlExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(HtmlExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    if (!isVisitorPath(req.path)) {
      super.catch(exception, host);
      return;
    }

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    if (exception instanceof HttpException) {
      status = exception.getStatus();
    } else {
      const err = exception instanceof Error ? exception : new Error(String(exception));
      this.logger.error(`Unhandled error: ${err.message}`, err.stack);
    }

    ctx.getResponse<Response>().status(status).type('html').send(buildErrorPage(status));
  }
}
