import { PoolDataSource } from '../datasource/pool/pool-data-source';
import { ServiceNameCustomizer } from './service-name.customizer';

describe('ServiceNameCustomizer', () => {
  const original = process.env.SERVICE_NAME;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.SERVICE_NAME;
    } else {
      process.env.SERVICE_NAME = original;
    }
  });

  it('prefixes the application name with the service name', () => {
    process.env.SERVICE_NAME = 'checkout';
    const dataSource = new PoolDataSource();
    dataSource.setName('ordersDb');

    new ServiceNameCustomizer().customize(dataSource);

    expect(dataSource.getSettings().applicationName).toBe('checkout/ordersDb');
  });

  it('leaves the data source alone without a service name', () => {
    delete process.env.SERVICE_NAME;
    const dataSource = new PoolDataSource();
    dataSource.configure({ applicationName: 'reports' });

    new ServiceNameCustomizer().customize(dataSource);

    expect(dataSource.getSettings().applicationName).toBe('reports');
  });
});
