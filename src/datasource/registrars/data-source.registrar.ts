import { DataSourceDefinitionRegistry } from '../registry/data-source-definition.registry';

export interface DataSourceRegistrar {
  readonly mode: 'single' | 'multiple';
  registerDefinitions(registry: DataSourceDefinitionRegistry): void;
}
