import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { TrackSelectionError } from '@trackfuse/track';
import { GpxParseError } from '@trackfuse/gpx';
import { FitDecodeError } from '@trackfuse/fit';
import { EmptyTrackRenderError } from '@trackfuse/map-renderer';

const CLIENT_ERRORS = [GpxParseError, FitDecodeError, TrackSelectionError, EmptyTrackRenderError];

function messageOf(response: string | object, fallback: string): string {
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
  }
  return fallback;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = messageOf(exception.getResponse(), exception.message);
    } else if (CLIENT_ERRORS.some((type) => exception instanceof type)) {
      status = HttpStatus.BAD_REQUEST;
      message = exception instanceof Error ? exception.message : 'Bad request';
      this.logger.warn(`${request.method} ${request.url}: ${message}`);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';
      this.logger.error(
        `Unhandled exception: ${exception instanceof Error ? exception.message : 'Unknown error'}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    response.status(status).json({
      statusCode: status,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
