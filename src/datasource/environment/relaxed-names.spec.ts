import {
  canonicalName,
  canonicalPath,
  endsWithIgnoreCase,
  separatedToCamel,
} from './relaxed-names';

describe('relaxed names', () => {
  describe('separatedToCamel', () => {
    it('joins dash and underscore separated pieces', () => {
      expect(separatedToCamel('orders-db')).toBe('ordersDb');
      expect(separatedToCamel('read_replica')).toBe('readReplica');
      expect(separatedToCamel('audit log store')).toBe('auditLogStore');
    });

    it('lowers the first character and keeps the rest as written', () => {
      expect(separatedToCamel('Read_Replica')).toBe('readReplica');
      expect(separatedToCamel('reportingDataSource')).toBe('reportingDataSource');
    });

    it('drops repeated and trailing separators', () => {
      expect(separatedToCamel('--orders__db-')).toBe('ordersDb');
      expect(separatedToCamel('---')).toBe('');
    });
  });

  it('canonicalizes segments', () => {
    expect(canonicalName('Orders-DB')).toBe('ordersdb');
    expect(canonicalName('idle_timeout_millis')).toBe('idletimeoutmillis');
    expect(canonicalPath('database.pool.data-sources')).toEqual([
      'database',
      'pool',
      'datasources',
    ]);
  });

  it('matches suffixes regardless of case', () => {
    expect(endsWithIgnoreCase('primaryDatasource', 'DataSource')).toBe(true);
    expect(endsWithIgnoreCase('ordersDb', 'DataSource')).toBe(false);
  });
});
