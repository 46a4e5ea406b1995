import { Pool } from 'pg';
import { PoolDataSource } from './pool-data-source';

describe('PoolDataSource', () => {
  let dataSource: PoolDataSource;

  beforeEach(() => {
    dataSource = new PoolDataSource();
  });

  afterEach(async () => {
    await dataSource.close();
  });

  it('is named dataSource until renamed', () => {
    expect(dataSource.getName()).toBe('dataSource');

    dataSource.setName('ordersDb');

    expect(dataSource.getName()).toBe('ordersDb');
  });

  it('merges settings, later values winning', () => {
    dataSource.configure({ max: 10, host: 'localhost' }).configure({ max: 4 });

    expect(dataSource.getSettings()).toEqual({ max: 4, host: 'localhost' });
  });

  it('maps settings onto pg pool options', () => {
    dataSource.setName('reporting');
    dataSource.configure({
      connectionString: 'postgres://localhost/reporting',
      max: 5,
      statementTimeout: 60000,
      idleInTransactionSessionTimeout: 1000,
    });

    expect(dataSource.toPoolConfig()).toMatchObject({
      connectionString: 'postgres://localhost/reporting',
      application_name: 'reporting',
      max: 5,
      statement_timeout: 60000,
      idle_in_transaction_session_timeout: 1000,
    });
  });

  it('passes TLS options through as the pg ssl object', () => {
    dataSource.configure({ ssl: { rejectUnauthorized: false } });

    expect(dataSource.toPoolConfig().ssl).toEqual({ rejectUnauthorized: false });
  });

  it('prefers an explicit application name', () => {
    dataSource.configure({ applicationName: 'billing' });

    expect(dataSource.toPoolConfig().application_name).toBe('billing');
  });

  it('creates the pg pool once on init', () => {
    expect(dataSource.isInitialized()).toBe(false);
    expect(() => dataSource.getPool()).toThrow(
      "Data source 'dataSource' has not been initialized",
    );

    dataSource.init();
    const pool = dataSource.getPool();
    dataSource.init();

    expect(pool).toBeInstanceOf(Pool);
    expect(dataSource.getPool()).toBe(pool);
    expect(dataSource.getStats()).toEqual({
      totalCount: 0,
      idleCount: 0,
      waitingCount: 0,
    });
  });

  it('refuses to be reconfigured after init', () => {
    dataSource.init();

    expect(() => dataSource.configure({ max: 2 })).toThrow(
      "Data source 'dataSource' is already initialized and cannot be reconfigured",
    );
  });

  it('closes once', async () => {
    dataSource.init();
    const pool = dataSource.getPool();
    const end = jest.spyOn(pool, 'end');

    await dataSource.close();
    await dataSource.onModuleDestroy();

    expect(end).toHaveBeenCalledTimes(1);
    expect(dataSource.isInitialized()).toBe(false);
  });
});
