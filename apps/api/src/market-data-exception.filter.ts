import {
  ArgumentsHost,
  Catch,
  HttpException,
  HttpServer,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { ProviderUnavailableError, SymbolNotFoundError, errorMessage } from '@libs/core';
import { NotificationSink } from '@libs/market-data';

interface RequestLine {
  method?: string;
  url?: string;
}

/**
 * Maps domain failures to HTTP statuses; everything else keeps Nest's default
 * handling. Errors that end as a 500 are also sent to the notifier.
 */
@Catch()
export class MarketDataExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(MarketDataExceptionFilter.name);

  constructor(applicationRef: HttpServer, private readonly notifier: NotificationSink | null = null) {
    super(applicationRef);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    if (exception instanceof SymbolNotFoundError) {
      super.catch(new NotFoundException(exception.message), host);
      return;
    }
    if (exception instanceof ProviderUnavailableError) {
      super.catch(new ServiceUnavailableException(exception.message), host);
      return;
    }
    if (!(exception instanceof HttpException)) {
      const request = host.switchToHttp().getRequest<RequestLine>();
      this.reportUnexpected(`${request.method ?? 'GET'} ${request.url ?? ''}`.trim(), exception);
    }
    super.catch(exception, host);
  }

  private reportUnexpected(context: string, exception: unknown): void {
    if (!this.notifier) {
      return;
    }
    this.notifier.notifyError(context, errorMessage(exception)).catch((error: unknown) => {
      this.logger.warn(JSON.stringify({ event: 'notification_failed', message: errorMessage(error) }));
    });
  }
}
