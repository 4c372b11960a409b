import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { SESSION_EVENTS, SessionTerminatedEvent } from './interfaces';

/**
 * Shuts the process down once the session is terminated. SIGTERM goes through the
 * graceful shutdown installed in `main.ts`.
 */
@Injectable()
export class SessionTerminationListener {
  private readonly logger = new Logger(SessionTerminationListener.name);

  @OnEvent(SESSION_EVENTS.TERMINATED)
  handleTerminated(event: SessionTerminatedEvent): void {
    this.logger.warn(`Shutting down after ${event.code}`);
    process.kill(process.pid, 'SIGTERM');
  }
}
