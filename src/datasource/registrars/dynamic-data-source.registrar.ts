import { DATA_SOURCE_SUFFIX } from '../datasource.constants';
import {
  endsWithIgnoreCase,
  separatedToCamel,
} from '../environment/relaxed-names';
import {
  DataSourceDefinitionRegistry,
  genericDataSourceDefinition,
} from '../registry/data-source-definition.registry';
import { DataSourceRegistrar } from './data-source.registrar';

/**
 * Registers one bean per configured data source
 *
 * `orders-db` becomes bean `ordersDb` with alias `ordersDbDataSource`;
 * `reporting-data-source` becomes `reportingDataSource` with no alias.
 */
export class DynamicDataSourceRegistrar implements DataSourceRegistrar {
  readonly mode = 'multiple';

  constructor(private readonly dataSourceNames: Iterable<string>) {}

  registerDefinitions(registry: DataSourceDefinitionRegistry): void {
    for (const dataSourceName of this.dataSourceNames) {
      const camelName = separatedToCamel(dataSourceName);
      registry.registerDefinition(camelName, genericDataSourceDefinition());

      if (!endsWithIgnoreCase(camelName, DATA_SOURCE_SUFFIX)) {
        registry.registerAlias(camelName, camelName + DATA_SOURCE_SUFFIX);
      }
    }
  }
}
