import { Injectable, Logger } from '@nestjs/common';
import appConfig from '../config/app.config';
import { withTransientRetry } from '../common/helper/retry.helper';

@Injectable()
export class TransientRetryService {
  private readonly logger = new Logger(TransientRetryService.name);
  private readonly attempts: number;
  private readonly delayMs: number;

  constructor() {
    const { retry } = appConfig().database;
    this.attempts = retry.attempts;
    this.delayMs = retry.delay_ms;
  }

  run<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withTransientRetry(operation, {
      attempts: this.attempts,
      delayMs: this.delayMs,
      label,
      logger: this.logger,
    });
  }
}
