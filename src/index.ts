export * from './datasource/datasource.constants';
export * from './datasource/datasource.errors';
export * from './datasource/datasource.decorators';
export * from './datasource/datasource-pool.module';
export { DataSourceManager } from './datasource/datasource-manager.service';
export * from './datasource/environment/environment';
export * from './datasource/environment/binder';
export * from './datasource/environment/relaxed-names';
export * from './datasource/pool/pool-data-source';
export * from './datasource/processor/data-source.post-processor';
export * from './datasource/registry/data-source-definition.registry';
export * from './datasource/registrars/data-source.registrar';
export { selectRegistrar } from './datasource/registrars/data-source.selector';
export { SingleDataSourceRegistrar } from './datasource/registrars/single-data-source.registrar';
export { DynamicDataSourceRegistrar } from './datasource/registrars/dynamic-data-source.registrar';
export * from './datasource/types/data-source-customizer.interface';
export * from './datasource/types/pool-settings';
