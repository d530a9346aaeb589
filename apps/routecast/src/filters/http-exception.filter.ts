import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { FetchError } from '@routecast/common';
import { GpxParseError } from '@routecast/gpx';
import { InvalidSpeedError } from '@routecast/alignment';

export interface ErrorBody {
  statusCode: number;
  message: string;
  path: string;
  timestamp: string;
}

function httpExceptionMessage(exception: HttpException): string {
  const exceptionResponse = exception.getResponse();
  if (typeof exceptionResponse === 'string') {
    return exceptionResponse;
  }
  if ('message' in exceptionResponse) {
    const { message } = exceptionResponse;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
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
      message = httpExceptionMessage(exception);
    } else if (exception instanceof InvalidSpeedError) {
      status = HttpStatus.BAD_REQUEST;
      message = exception.message;
    } else if (exception instanceof GpxParseError) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      message = exception.message;
    } else if (exception instanceof FetchError) {
      status = HttpStatus.BAD_GATEWAY;
      message = 'Upstream service unavailable';
      this.logger.warn(`Upstream request failed: ${exception.message} (${exception.url})`);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Internal server error';
      this.logger.error(
        `Unhandled exception: ${exception instanceof Error ? exception.message : 'Unknown error'}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ErrorBody = {
      statusCode: status,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    response.status(status).json(body);
  }
}
