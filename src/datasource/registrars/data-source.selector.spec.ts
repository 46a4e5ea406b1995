import { DataSourceDefinitionError } from '../datasource.errors';
import { Environment } from '../environment/environment';
import { PoolDataSource } from '../pool/pool-data-source';
import { DataSourceDefinitionRegistry } from '../registry/data-source-definition.registry';
import { selectRegistrar } from './data-source.selector';
import { DynamicDataSourceRegistrar } from './dynamic-data-source.registrar';
import { SingleDataSourceRegistrar } from './single-data-source.registrar';

describe('data source registration', () => {
  let registry: DataSourceDefinitionRegistry;

  beforeEach(() => {
    registry = new DataSourceDefinitionRegistry();
  });

  describe('selectRegistrar', () => {
    it('selects a single data source when no named pools are configured', () => {
      const registrar = selectRegistrar(
        Environment.of({ database: { pool: { max: 5 } } }),
      );

      expect(registrar).toBeInstanceOf(SingleDataSourceRegistrar);
      expect(registrar.mode).toBe('single');
    });

    it('selects named data sources when any entry exists', () => {
      const registrar = selectRegistrar(
        Environment.of({
          'database.pool.data-sources.orders-db.max': 5,
        }),
      );

      expect(registrar).toBeInstanceOf(DynamicDataSourceRegistrar);
      registrar.registerDefinitions(registry);
      expect(registry.getDefinitionNames()).toEqual(['ordersDb']);
    });
  });

  describe('SingleDataSourceRegistrar', () => {
    it('registers dataSource once', () => {
      const registrar = new SingleDataSourceRegistrar();

      registrar.registerDefinitions(registry);
      registrar.registerDefinitions(registry);

      expect(registry.getDefinitionNames()).toEqual(['dataSource']);
      expect(registry.getAliases('dataSource')).toEqual([]);
    });

    it('leaves an application-registered dataSource in place', () => {
      const own = new PoolDataSource();
      registry.registerDefinition('dataSource', { create: () => own });

      new SingleDataSourceRegistrar().registerDefinitions(registry);

      expect(registry.getDefinitionNames()).toEqual(['dataSource']);
      expect(registry.toProviders()).toHaveLength(1);
    });
  });

  describe('DynamicDataSourceRegistrar', () => {
    it('camel-cases names and adds DataSource aliases', () => {
      new DynamicDataSourceRegistrar([
        'orders-db',
        'read_replica',
        'reporting-data-source',
        'legacyDatasource',
      ]).registerDefinitions(registry);

      expect(registry.getDefinitionNames()).toEqual([
        'ordersDb',
        'readReplica',
        'reportingDataSource',
        'legacyDatasource',
      ]);
      expect(registry.getAliases('ordersDb')).toEqual(['ordersDbDataSource']);
      expect(registry.getAliases('readReplica')).toEqual([
        'readReplicaDataSource',
      ]);
      expect(registry.getAliases('reportingDataSource')).toEqual([]);
      expect(registry.getAliases('legacyDatasource')).toEqual([]);
    });

    it('fails when two keys camel-case to the same name', () => {
      const registrar = new DynamicDataSourceRegistrar(['orders-db', 'orders_db']);

      expect(() => registrar.registerDefinitions(registry)).toThrow(
        DataSourceDefinitionError,
      );
    });
  });
});
