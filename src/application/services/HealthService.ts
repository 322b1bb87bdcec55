/**
 * Health Service
 * Layer: Application
 *
 * Asks each database target who we are connected as. A target that is not
 * configured, or that fails to answer, reports null; the failure is logged
 * and the check of the other target still runs. The service is "ok" when the
 * primary answered.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IDatabaseConnector } from '@domain/interfaces/IDatabaseConnector';
import type { IDatabaseSession } from '@domain/interfaces/IDatabaseSession';
import type { DatabaseTarget } from '@shared/constants';
import type { DbRecord } from '@shared/types';
import { inject, injectable } from 'tsyringe';

export const SESSION_CHECK_SQL = 'SELECT session_user, current_database()';

export interface HealthReport {
  status: 'ok' | 'degraded';
  primary: DbRecord | null;
  secondary: DbRecord | null;
}

@injectable()
export class HealthService {
  constructor(@inject(TOKENS.Logger) private log: Logger) {}

  async check(db: IDatabaseSession): Promise<HealthReport> {
    const [primary, secondary] = await Promise.all([
      this.checkTarget('primary', () => db.primary()),
      this.checkTarget('secondary', () => db.secondary()),
    ]);

    return { status: primary ? 'ok' : 'degraded', primary, secondary };
  }

  private async checkTarget(
    target: DatabaseTarget,
    open: () => Promise<IDatabaseConnector | null>,
  ): Promise<DbRecord | null> {
    try {
      const connector = await open();
      return connector ? await connector.fetchOne(SESSION_CHECK_SQL) : null;
    } catch (err) {
      this.log.error({ err, target }, 'Database health check failed');
      return null;
    }
  }
}
