import { Controller, Get, Header } from '@nestjs/common';
import { HealthService } from './health';
import { register } from './metrics';

/**
 * Health and metrics controller
 */
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * Liveness probe
   */
  @Get('/health')
  getLiveness() {
    return this.healthService.getLiveness();
  }

  /**
   * Readiness probe, reports every data source
   */
  @Get('/ready')
  getReadiness() {
    return this.healthService.getReadiness();
  }

  @Get('/info')
  getInfo() {
    return this.healthService.getInfo();
  }

  /**
   * Prometheus metrics endpoint
   */
  @Get('/metrics')
  @Header('Content-Type', register.contentType)
  async getMetrics() {
    this.healthService.refreshPoolMetrics();
    return register.metrics();
  }
}
