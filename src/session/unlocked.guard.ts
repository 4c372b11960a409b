import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { SessionService } from './session.service';

/**
 * Rejects requests while the vault is locked, uninitialized or terminated.
 * The `OtpError` it throws is mapped to a status by `OtpErrorFilter`.
 */
@Injectable()
export class UnlockedGuard implements CanActivate {
  constructor(private readonly sessionService: SessionService) {}

  canActivate(_context: ExecutionContext): boolean {
    this.sessionService.requireUnlocked();
    return true;
  }
}
