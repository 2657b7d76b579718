import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { DomainError, DomainErrorCode } from '../errors';

const STATUS_BY_CODE: Record<DomainErrorCode, HttpStatus> = {
  DUPLICATE_NAME: HttpStatus.CONFLICT,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_CREDENTIALS: HttpStatus.UNAUTHORIZED,
  NOT_AUTHENTICATED: HttpStatus.UNAUTHORIZED,
  UNKNOWN_RECIPIENT: HttpStatus.UNPROCESSABLE_ENTITY,
  UNSUPPORTED_TYPE: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  STORAGE_FAULT: HttpStatus.INTERNAL_SERVER_ERROR,
};

export interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    path: string;
  };
}

/**
 * 전역 예외 필터
 * DomainError 는 code 별 상태 코드로, HttpException 은 HTTP_<status>, 나머지는 500
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'Internal server error';

    if (exception instanceof DomainError) {
      status = STATUS_BY_CODE[exception.code];
      code = exception.code;
      message = exception.message;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = `HTTP_${status}`;
      message = exception.message;
    }

    // 서버 측 실패만 스택과 함께 기록
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const error = exception instanceof Error ? exception : new Error(String(exception));
      this.logger.error(
        `[${code}] ${request.method} ${request.url} - ${error.message}`,
        error.stack,
      );
    } else {
      this.logger.debug(`[${code}] ${request.method} ${request.url} - ${message}`);
    }

    const body: ErrorBody = {
      success: false,
      error: {
        code,
        message,
        timestamp: new Date().toISOString(),
        path: request.url,
      },
    };
    response.status(status).json(body);
  }
}
