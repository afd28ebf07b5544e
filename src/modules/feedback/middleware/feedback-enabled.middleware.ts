import { Injectable, NestMiddleware, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NextFunction, Request, Response } from 'express';

/**
 * Hides every feedback route while FEEDBACK_ENABLED is "false". Runs ahead
 * of the guards, so a disabled feature answers 404 whatever the credentials.
 */
@Injectable()
export class FeedbackEnabledMiddleware implements NestMiddleware {
  private readonly enabled: boolean;

  constructor(configService: ConfigService) {
    this.enabled = (configService.get<string>('FEEDBACK_ENABLED') ?? 'true') !== 'false';
  }

  use(_req: Request, _res: Response, next: NextFunction): void {
    if (!this.enabled) {
      throw new NotFoundException();
    }
    next();
  }
}
