import { Inject, Injectable, Optional } from '@nestjs/common';
import { logDataSourceEvent } from '../../../libs/observability/logger';
import {
  DATA_SOURCE_CUSTOMIZERS,
  DATA_SOURCE_ENVIRONMENT,
  DATA_SOURCES_PREFIX,
  POOL_PREFIX,
} from '../datasource.constants';
import { Binder } from '../environment/binder';
import { canonicalName } from '../environment/relaxed-names';
import { Environment } from '../environment/environment';
import { PoolDataSource } from '../pool/pool-data-source';
import { DataSourceCustomizer } from '../types/data-source-customizer.interface';
import { bindPoolSettings } from '../types/pool-settings';

const DATA_SOURCES_KEY = canonicalName('data-sources');

function isDataSourcesEntry(name: string): boolean {
  return name === DATA_SOURCES_KEY || name.startsWith(`${DATA_SOURCES_KEY}.`);
}

/**
 * Prepares every data source before `init()`:
 * names it, binds shared then per-pool configuration, and runs customizers
 * in registration order
 */
@Injectable()
export class DataSourcePostProcessor {
  private readonly customizers: DataSourceCustomizer[];
  private readonly dataSourceNames: string[];

  constructor(
    @Inject(DATA_SOURCE_ENVIRONMENT) private readonly environment: Environment,
    @Optional()
    @Inject(DATA_SOURCE_CUSTOMIZERS)
    customizers?: DataSourceCustomizer[],
  ) {
    this.customizers = customizers ?? [];
    this.dataSourceNames = Array.from(
      Binder.get(environment).bindMap(DATA_SOURCES_PREFIX).keys(),
    );
  }

  isMultiple(): boolean {
    return this.dataSourceNames.length > 0;
  }

  postProcessBeforeInitialization(
    dataSource: PoolDataSource,
    beanName: string,
  ): PoolDataSource {
    const mode = this.isMultiple() ? 'multiple' : 'single';
    logDataSourceEvent(beanName, mode, 'init');

    dataSource.setName(beanName);

    const binder = Binder.get(this.environment);
    const shared = binder
      .bindProperties(POOL_PREFIX)
      .filter((property) => !isDataSourcesEntry(property.name));
    dataSource.configure(
      bindPoolSettings(beanName, shared, { skipNested: true }),
    );

    // `ordersDb` reads `database.pool.data-sources.orders-db`
    if (this.isMultiple()) {
      dataSource.configure(
        bindPoolSettings(
          beanName,
          binder.bindProperties(`${DATA_SOURCES_PREFIX}.${beanName}`),
        ),
      );
    }
    logDataSourceEvent(beanName, mode, 'bound');

    this.customizers.forEach((customizer) => customizer.customize(dataSource));
    if (this.customizers.length > 0) {
      logDataSourceEvent(beanName, mode, 'customized', {
        customizers: this.customizers.length,
      });
    }

    return dataSource;
  }
}
