import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { hasErrorCode } from '../errors/option.exceptions';

function messageOf(exception: HttpException): string | string[] {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body && (typeof body.message === 'string' || Array.isArray(body.message))) {
    return body.message;
  }
  return exception.message;
}

// Renders every HttpException (domain errors included) as HttpExceptionResponse.
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const statusCode = exception.getStatus();

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${request.method} ${request.url} failed: ${exception.message}`, exception.stack);
    }

    const body: HttpExceptionResponse = {
      statusCode,
      message: messageOf(exception),
      error: hasErrorCode(exception) ? exception.code : exception.name,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }
}
