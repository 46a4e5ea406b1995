import { DATA_SOURCES_PREFIX } from '../datasource.constants';
import { Binder } from '../environment/binder';
import { Environment } from '../environment/environment';
import { DataSourceRegistrar } from './data-source.registrar';
import { DynamicDataSourceRegistrar } from './dynamic-data-source.registrar';
import { SingleDataSourceRegistrar } from './single-data-source.registrar';

/**
 * Any entry under `database.pool.data-sources` selects multiple pools;
 * none selects the single default pool
 */
export function selectRegistrar(environment: Environment): DataSourceRegistrar {
  const dataSources = Binder.get(environment).bindMap(DATA_SOURCES_PREFIX);

  return dataSources.size === 0
    ? new SingleDataSourceRegistrar()
    : new DynamicDataSourceRegistrar(Array.from(dataSources.keys()));
}
