import { Injectable, NestMiddleware, RequestMethod } from '@nestjs/common';
import type { RouteInfo } from '@nestjs/common/interfaces';
import { Request, Response, NextFunction } from 'express';
import { SessionService } from './session.service';

/**
 * Reads a display polls on a timer. They are not user input and never postpone the idle lock.
 */
export const POLLING_ROUTES: RouteInfo[] = [
  { path: 'api/codes', method: RequestMethod.GET },
  { path: 'api/credentials', method: RequestMethod.GET },
  { path: 'api/session', method: RequestMethod.GET },
  { path: 'api/import/status', method: RequestMethod.GET },
];

/**
 * Counts an API request as user activity for the idle lock.
 */
@Injectable()
export class ActivityMiddleware implements NestMiddleware {
  constructor(private readonly sessionService: SessionService) {}

  use(_req: Request, _res: Response, next: NextFunction): void {
    this.sessionService.touch();
    next();
  }
}
