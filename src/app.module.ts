import { Module } from '@nestjs/common';
import { ObservabilityModule } from '../libs/observability';
import { ServiceNameCustomizer } from './customizers/service-name.customizer';
import { DataSourcePoolModule } from './datasource/datasource-pool.module';

@Module({
  imports: [
    // Pools come from `database.pool.*` in the environment or config file
    DataSourcePoolModule.forRoot({
      environment: { configFile: process.env.APP_CONFIG_FILE },
      customizers: [ServiceNameCustomizer],
    }),
    ObservabilityModule,
  ],
})
export class AppModule {}
