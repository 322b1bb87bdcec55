/**
 * Health Controller
 * Layer: Interfaces (HTTP)
 *
 * `GET /` reports which database session each target answers with. It always
 * responds 200; a target that is down shows up as null and flips `status`
 * to "degraded".
 */
import type { HealthService } from '@application/services/HealthService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { sessionOf } from '@interfaces/http/middleware/databaseSession';
import type { Request, Response } from 'express';

export class HealthController {
  private service: HealthService;

  constructor() {
    this.service = container.resolve<HealthService>(TOKENS.HealthService);
  }

  index = async (_req: Request, res: Response): Promise<void> => {
    const report = await this.service.check(sessionOf(res));

    res.status(200).json({
      status: report.status,
      message: report.status === 'ok' ? 'Service is up' : 'Primary database is unavailable',
      data: {
        postgres: report.primary,
        oracle: report.secondary,
      },
    });
  };
}
