import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ChirpyError } from './chirpy-error';

@Catch(ChirpyError)
export class ChirpyErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ChirpyErrorFilter.name);

  catch(exception: ChirpyError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    const detail = exception.originalError
      ? ` (${exception.originalError.message})`
      : '';
    const line = `${exception.code}: ${exception.message}${detail}`;

    if (exception.httpStatusCode >= 500) {
      this.logger.error(line, exception.originalError?.stack);
    } else {
      this.logger.warn(line);
    }

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }
}
