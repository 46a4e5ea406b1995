import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { ModuleRef } from '@nestjs/core';
import {
  dataSourcesRegistered,
  setGauge,
} from '../../libs/observability/metrics';
import { DATA_SOURCE_DEFINITIONS } from './datasource.constants';
import { PoolDataSource } from './pool/pool-data-source';
import { DataSourceDefinitions } from './registry/data-source-definition.registry';

/**
 * Runtime view of the registered data sources
 */
@Injectable()
export class DataSourceManager implements OnModuleInit {
  constructor(
    private readonly moduleRef: ModuleRef,
    @Inject(DATA_SOURCE_DEFINITIONS)
    private readonly definitions: DataSourceDefinitions,
  ) {}

  /**
   * Runs once every pool provider has been created, replacing any series
   * left by an earlier bootstrap
   */
  onModuleInit(): void {
    dataSourcesRegistered.reset();
    setGauge(dataSourcesRegistered, this.definitions.names.length, {
      mode: this.definitions.mode,
    });
  }

  getMode(): DataSourceDefinitions['mode'] {
    return this.definitions.mode;
  }

  getNames(): string[] {
    return [...this.definitions.names];
  }

  getAliases(name: string): string[] {
    return [...(this.definitions.aliases[name] ?? [])];
  }

  /**
   * Resolve a data source by bean name or alias
   */
  get(nameOrAlias: string): PoolDataSource {
    const name = this.resolveName(nameOrAlias);
    if (!name) {
      throw new Error(`No data source named '${nameOrAlias}'`);
    }
    return this.moduleRef.get<PoolDataSource>(name, { strict: false });
  }

  getAll(): PoolDataSource[] {
    return this.definitions.names.map((name) => this.get(name));
  }

  private resolveName(nameOrAlias: string): string | undefined {
    if (this.definitions.names.includes(nameOrAlias)) {
      return nameOrAlias;
    }
    return this.definitions.names.find((name) =>
      this.getAliases(name).includes(nameOrAlias),
    );
  }
}
