import { Injectable } from '@nestjs/common';
import { PoolDataSource } from '../datasource/pool/pool-data-source';
import { DataSourceCustomizer } from '../datasource/types/data-source-customizer.interface';

/**
 * Reports connections as `<service>/<data source>` when SERVICE_NAME is set
 */
@Injectable()
export class ServiceNameCustomizer implements DataSourceCustomizer {
  private readonly serviceName = process.env.SERVICE_NAME;

  customize(dataSource: PoolDataSource): void {
    if (!this.serviceName) {
      return;
    }
    const applicationName =
      dataSource.getSettings().applicationName ?? dataSource.getName();
    dataSource.configure({
      applicationName: `${this.serviceName}/${applicationName}`,
    });
  }
}
