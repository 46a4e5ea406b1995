import { DynamicModule, Module, Provider } from '@nestjs/common';
import {
  DATA_SOURCE_CUSTOMIZERS,
  DATA_SOURCE_DEFINITIONS,
  DATA_SOURCE_ENVIRONMENT,
} from './datasource.constants';
import { DataSourceManager } from './datasource-manager.service';
import { Environment, EnvironmentOptions } from './environment/environment';
import { DataSourcePostProcessor } from './processor/data-source.post-processor';
import {
  DataSourceDefinition,
  DataSourceDefinitionRegistry,
} from './registry/data-source-definition.registry';
import { selectRegistrar } from './registrars/data-source.selector';
import {
  DataSourceCustomizer,
  DataSourceCustomizerProvider,
  isCustomizerClass,
  toCustomizer,
} from './types/data-source-customizer.interface';

export interface DataSourcePoolModuleOptions {
  /**
   * Configuration to read pools from; loaded from the process environment
   * and `config/application.yaml` when omitted
   */
  environment?: Environment | EnvironmentOptions;

  /**
   * Applied to every data source in order, after configuration binding
   */
  customizers?: DataSourceCustomizerProvider[];

  /**
   * Data sources the application builds itself, registered ahead of the
   * configured ones and post-processed like them. A `dataSource` entry
   * replaces the default single pool.
   */
  definitions?: Record<string, DataSourceDefinition>;

  /**
   * Defaults to true
   */
  isGlobal?: boolean;
}

function customizersProvider(
  customizers: DataSourceCustomizerProvider[],
): Provider[] {
  const classes = customizers.filter(isCustomizerClass);

  return [
    ...classes,
    {
      provide: DATA_SOURCE_CUSTOMIZERS,
      useFactory: (...instances: DataSourceCustomizer[]) =>
        customizers.map((customizer) =>
          isCustomizerClass(customizer)
            ? instances[classes.indexOf(customizer)]
            : toCustomizer(customizer),
        ),
      inject: classes,
    },
  ];
}

/**
 * Data Source Pool Module
 * Registers one PostgreSQL pool named `dataSource`, or one pool per entry
 * under `database.pool.data-sources`, each with a `DataSource` alias
 */
@Module({})
export class DataSourcePoolModule {
  static forRoot(options: DataSourcePoolModuleOptions = {}): DynamicModule {
    const environment =
      options.environment instanceof Environment
        ? options.environment
        : Environment.load(options.environment);

    const registrar = selectRegistrar(environment);
    const registry = new DataSourceDefinitionRegistry();
    for (const [name, definition] of Object.entries(
      options.definitions ?? {},
    )) {
      registry.registerDefinition(name, definition);
    }
    registrar.registerDefinitions(registry);

    return {
      module: DataSourcePoolModule,
      global: options.isGlobal ?? true,
      providers: [
        { provide: DATA_SOURCE_ENVIRONMENT, useValue: environment },
        {
          provide: DATA_SOURCE_DEFINITIONS,
          useValue: registry.describe(registrar.mode),
        },
        ...customizersProvider(options.customizers ?? []),
        DataSourcePostProcessor,
        ...registry.toProviders(),
        DataSourceManager,
      ],
      exports: [
        DATA_SOURCE_ENVIRONMENT,
        DataSourcePostProcessor,
        DataSourceManager,
        ...registry.getTokens(),
      ],
    };
  }
}
