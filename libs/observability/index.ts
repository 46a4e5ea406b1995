export * from './metrics';
export * from './logger';
export { HealthService } from './health';
export { HealthController } from './health.controller';
export { ObservabilityModule } from './observability.module';
