import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  UpstreamError,
  UpstreamStatusError,
  UpstreamTransportError,
} from '../ipma/ipma.errors';

export interface UpstreamErrorBody {
  statusCode: number;
  error: string;
  code: string;
  message: string;
  upstreamStatus?: number;
}

/**
 * Map IPMA failures to gateway errors: 504 when IPMA timed out, 502 otherwise
 */
export function toUpstreamErrorBody(exception: UpstreamError): UpstreamErrorBody {
  if (exception instanceof UpstreamTransportError && exception.isTimeout) {
    return {
      statusCode: HttpStatus.GATEWAY_TIMEOUT,
      error: 'Gateway Timeout',
      code: 'UPSTREAM_TIMEOUT',
      message: 'IPMA did not respond in time',
    };
  }

  if (exception instanceof UpstreamStatusError) {
    return {
      statusCode: HttpStatus.BAD_GATEWAY,
      error: 'Bad Gateway',
      code: exception.code,
      message: `IPMA responded with status ${exception.status}`,
      upstreamStatus: exception.status,
    };
  }

  return {
    statusCode: HttpStatus.BAD_GATEWAY,
    error: 'Bad Gateway',
    code: exception.code,
    message: 'IPMA is unreachable',
  };
}

@Catch(UpstreamError)
export class UpstreamExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(UpstreamExceptionFilter.name);

  catch(exception: UpstreamError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = toUpstreamErrorBody(exception);

    this.logger.warn(`${body.code}: ${exception.message}`);
    response.status(body.statusCode).json(body);
  }
}
