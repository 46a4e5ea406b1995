import { Injectable } from '@nestjs/common';
import * as os from 'os';
import { DataSourceManager } from '../../src/datasource/datasource-manager.service';
import { recordPoolStats } from './metrics';

export interface DataSourceCheck {
  initialized: boolean;
  aliases: string[];
  total: number;
  idle: number;
  waiting: number;
}

/**
 * Health check service
 */
@Injectable()
export class HealthService {
  constructor(private readonly dataSourceManager: DataSourceManager) {}

  /**
   * Liveness probe - is the service alive?
   */
  getLiveness() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  /**
   * Readiness probe - are all data sources initialized?
   * Pools open clients lazily, so no connection is attempted here
   */
  getReadiness() {
    const pools: Record<string, DataSourceCheck> = {};

    for (const dataSource of this.dataSourceManager.getAll()) {
      const name = dataSource.getName();
      const stats = dataSource.getStats();
      pools[name] = {
        initialized: dataSource.isInitialized(),
        aliases: this.dataSourceManager.getAliases(name),
        total: stats.totalCount,
        idle: stats.idleCount,
        waiting: stats.waitingCount,
      };
    }

    const allOk = Object.values(pools).every((pool) => pool.initialized);

    return {
      status: allOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        dataSources: {
          status: allOk ? 'ok' : 'degraded',
          mode: this.dataSourceManager.getMode(),
          pools,
        },
      },
    };
  }

  /**
   * Push current pool counts into the metrics registry
   */
  refreshPoolMetrics(): void {
    for (const dataSource of this.dataSourceManager.getAll()) {
      recordPoolStats(dataSource.getName(), dataSource.getStats());
    }
  }

  /**
   * Detailed system info
   */
  getInfo() {
    return {
      service: process.env.SERVICE_NAME || 'datasource-pools',
      version: process.env.npm_package_version || '0.1.0',
      environment: process.env.NODE_ENV || 'development',
      dataSources: this.dataSourceManager.getNames(),
      node: {
        version: process.version,
        platform: process.platform,
        arch: process.arch,
      },
      system: {
        hostname: os.hostname(),
        totalMemory: os.totalmem(),
        freeMemory: os.freemem(),
        cpus: os.cpus().length,
      },
      process: {
        pid: process.pid,
        uptime: process.uptime(),
        memoryUsage: process.memoryUsage(),
      },
    };
  }
}
