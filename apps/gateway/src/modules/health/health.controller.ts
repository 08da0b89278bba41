// src/modules/health/health.controller.ts
import { Controller, Get, Logger, ServiceUnavailableException } from '@nestjs/common';
import { HealthViewZ } from '@unwind/types-zod';
import type { HealthView } from '@unwind/types-zod';
import { QueryExecutor } from '@/modules/infra/database/query-executor.service';

@Controller('v1/health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(private readonly db: QueryExecutor) {}

  /**
   * GET /v1/health
   * Round-trips `SELECT 1` through the pool; 503 when the backend is unreachable.
   */
  @Get()
  async check(): Promise<HealthView> {
    try {
      await this.db.ping();
    } catch (err) {
      this.logger.warn(`Health check failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new ServiceUnavailableException('Database unavailable');
    }
    return HealthViewZ.parse({ status: 'ok', database: this.db.state });
  }
}
