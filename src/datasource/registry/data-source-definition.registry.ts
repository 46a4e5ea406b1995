import { Provider } from '@nestjs/common';
import { DataSourceDefinitionError } from '../datasource.errors';
import { PoolDataSource } from '../pool/pool-data-source';
import { DataSourcePostProcessor } from '../processor/data-source.post-processor';

/**
 * How to build one pool bean: construct, post-process, then `init()`.
 * `close()` runs from the instance's own destroy hook.
 */
export interface DataSourceDefinition {
  create(): PoolDataSource;
}

/**
 * Registered names and aliases, exposed to DataSourceManager at runtime
 */
export interface DataSourceDefinitions {
  mode: 'single' | 'multiple';
  names: string[];
  aliases: Record<string, string[]>;
}

export function genericDataSourceDefinition(): DataSourceDefinition {
  return { create: () => new PoolDataSource() };
}

/**
 * Collects data source definitions and aliases before they become Nest
 * providers
 */
export class DataSourceDefinitionRegistry {
  private readonly definitions = new Map<string, DataSourceDefinition>();
  private readonly aliases = new Map<string, string>();

  containsDefinition(name: string): boolean {
    return this.definitions.has(name);
  }

  registerDefinition(name: string, definition: DataSourceDefinition): void {
    if (!name) {
      throw new DataSourceDefinitionError(
        'Data source name must not be empty',
      );
    }
    if (this.definitions.has(name) || this.aliases.has(name)) {
      throw new DataSourceDefinitionError(
        `Data source '${name}' is already registered`,
      );
    }
    this.definitions.set(name, definition);
  }

  registerAlias(name: string, alias: string): void {
    if (!this.definitions.has(name)) {
      throw new DataSourceDefinitionError(
        `Cannot alias unknown data source '${name}'`,
      );
    }
    if (this.definitions.has(alias) || this.aliases.has(alias)) {
      throw new DataSourceDefinitionError(
        `Alias '${alias}' for data source '${name}' is already in use`,
      );
    }
    this.aliases.set(alias, name);
  }

  getDefinitionNames(): string[] {
    return Array.from(this.definitions.keys());
  }

  getAliases(name: string): string[] {
    return Array.from(this.aliases.entries())
      .filter(([, target]) => target === name)
      .map(([alias]) => alias);
  }

  describe(mode: DataSourceDefinitions['mode']): DataSourceDefinitions {
    const aliases: Record<string, string[]> = {};
    for (const name of this.definitions.keys()) {
      aliases[name] = this.getAliases(name);
    }
    return { mode, names: this.getDefinitionNames(), aliases };
  }

  /**
   * One factory provider per definition and one `useExisting` provider per
   * alias
   */
  toProviders(): Provider[] {
    const providers: Provider[] = [];

    for (const [name, definition] of this.definitions) {
      providers.push({
        provide: name,
        useFactory: (postProcessor: DataSourcePostProcessor) => {
          const dataSource = postProcessor.postProcessBeforeInitialization(
            definition.create(),
            name,
          );
          dataSource.init();
          return dataSource;
        },
        inject: [DataSourcePostProcessor],
      });
    }

    for (const [alias, name] of this.aliases) {
      providers.push({ provide: alias, useExisting: name });
    }

    return providers;
  }

  /**
   * Tokens to export from the module: names followed by aliases
   */
  getTokens(): string[] {
    return [...this.definitions.keys(), ...this.aliases.keys()];
  }
}
