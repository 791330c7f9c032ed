import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { errorMessage } from '../common/error-message';
import { SessionService } from './session.service';

@Injectable()
export class SessionJanitorService {
  private readonly logger = new Logger(SessionJanitorService.name);

  constructor(private readonly sessionService: SessionService) {}

  @Cron(CronExpression.EVERY_HOUR)
  async purgeExpired(): Promise<number> {
    try {
      const removed = await this.sessionService.purgeExpiredSessions();
      if (removed > 0) {
        this.logger.log(`Purged ${removed} expired sessions`);
      }
      return removed;
    } catch (error) {
      this.logger.error(`Session purge failed: ${errorMessage(error)}`);
      return 0;
    }
  }
}
