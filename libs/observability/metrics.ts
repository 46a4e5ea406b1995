import { Registry, Gauge, collectDefaultMetrics } from 'prom-client';

// Create registry
export const register = new Registry();

// Collect default metrics (CPU, memory, event loop, etc.)
collectDefaultMetrics({ register });

// ==================== DATA SOURCE METRICS ====================

export const dataSourcesRegistered = new Gauge({
  name: 'datasource_pools_registered',
  help: 'Number of data source pools registered at startup',
  labelNames: ['mode'], // mode: single/multiple
  registers: [register],
});

export const dataSourceConnections = new Gauge({
  name: 'datasource_pool_connections',
  help: 'Clients held by each data source pool',
  labelNames: ['data_source', 'state'], // state: total/idle/waiting
  registers: [register],
});

// ==================== HELPER FUNCTIONS ====================

/**
 * Set gauge value
 */
export function setGauge(
  gauge: Gauge<string>,
  value: number,
  labels: Record<string, string | number> = {},
) {
  gauge.set(labels, value);
}

/**
 * Record one pool's client counts
 */
export function recordPoolStats(
  dataSource: string,
  stats: { totalCount: number; idleCount: number; waitingCount: number },
) {
  setGauge(dataSourceConnections, stats.totalCount, {
    data_source: dataSource,
    state: 'total',
  });
  setGauge(dataSourceConnections, stats.idleCount, {
    data_source: dataSource,
    state: 'idle',
  });
  setGauge(dataSourceConnections, stats.waitingCount, {
    data_source: dataSource,
    state: 'waiting',
  });
}
