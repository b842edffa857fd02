import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import {
  AssemblyCancelledError,
  CatalogUnavailableError,
  DialogueError,
  NoVoicesForFilterError,
  SessionBusyError,
  TurnLimitError,
  TurnNotFoundError,
  VoiceNotAvailableError,
} from '../domain/errors';

/** Maps domain errors that escape a controller onto HTTP responses. */
@Catch(DialogueError)
export class DialogueErrorsFilter implements ExceptionFilter {
  private readonly logger = new Logger(DialogueErrorsFilter.name);

  catch(error: DialogueError, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    if (error instanceof AssemblyCancelledError) {
      this.logger.log(error.message);
      if (!res.headersSent && !res.writableEnded) {
        res.end();
      }
      return;
    }
    if (res.headersSent) {
      this.logger.error(`Error after response started: ${error.message}`);
      return;
    }
    const status = this.statusFor(error);
    if (status >= 500) {
      this.logger.error(error.message);
    }
    res.status(status).json({ statusCode: status, error: error.name, message: error.message });
  }

  private statusFor(error: DialogueError): number {
    if (error instanceof CatalogUnavailableError) {
      return HttpStatus.SERVICE_UNAVAILABLE;
    }
    if (error instanceof NoVoicesForFilterError) {
      return HttpStatus.UNPROCESSABLE_ENTITY;
    }
    if (error instanceof TurnLimitError || error instanceof VoiceNotAvailableError) {
      return HttpStatus.BAD_REQUEST;
    }
    if (error instanceof TurnNotFoundError) {
      return HttpStatus.NOT_FOUND;
    }
    if (error instanceof SessionBusyError) {
      return HttpStatus.CONFLICT;
    }
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}
