import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  ForbiddenException,
  HttpException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  FeedbackAuthorizationError,
  FeedbackError,
  FeedbackNotFoundError,
} from '../errors/feedback.errors';

export function toHttpException(error: FeedbackError): HttpException {
  if (error instanceof FeedbackNotFoundError) {
    return new NotFoundException(error.message);
  }

  if (error instanceof FeedbackAuthorizationError) {
    return new ForbiddenException(error.message);
  }

  // Validation and dispute-state conflicts
  return new UnprocessableEntityException({
    statusCode: 422,
    error: error.message,
    code: error.code,
  });
}

@Catch(FeedbackError)
export class FeedbackExceptionFilter implements ExceptionFilter<FeedbackError> {
  catch(exception: FeedbackError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const httpException = toHttpException(exception);

    response.status(httpException.getStatus()).json(httpException.getResponse());
  }
}
