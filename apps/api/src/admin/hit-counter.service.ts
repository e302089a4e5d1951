import { Injectable } from '@nestjs/common';
import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Counts requests to the static file server. Lives for the process.
 */
@Injectable()
export class HitCounterService {
  private hits = 0;

  increment(): number {
    this.hits += 1;
    return this.hits;
  }

  get count(): number {
    return this.hits;
  }

  reset(): void {
    this.hits = 0;
  }

  /**
   * Express middleware counting every request it sees
   */
  middleware(): RequestHandler {
    return (_req: Request, _res: Response, next: NextFunction) => {
      this.increment();
      next();
    };
  }
}
