import { DEFAULT_DATA_SOURCE_NAME } from '../datasource.constants';
import {
  DataSourceDefinitionRegistry,
  genericDataSourceDefinition,
} from '../registry/data-source-definition.registry';
import { DataSourceRegistrar } from './data-source.registrar';

/**
 * Registers the single `dataSource` bean
 */
export class SingleDataSourceRegistrar implements DataSourceRegistrar {
  readonly mode = 'single';

  registerDefinitions(registry: DataSourceDefinitionRegistry): void {
    if (!registry.containsDefinition(DEFAULT_DATA_SOURCE_NAME)) {
      registry.registerDefinition(
        DEFAULT_DATA_SOURCE_NAME,
        genericDataSourceDefinition(),
      );
    }
  }
}
