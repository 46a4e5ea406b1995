import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { ObservabilityModule } from '../libs/observability';
import { DataSourcePoolModule } from '../src/datasource/datasource-pool.module';
import { Environment } from '../src/datasource/environment/environment';

describe('Health (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        DataSourcePoolModule.forRoot({
          environment: Environment.of({
            database: {
              pool: {
                'data-sources': {
                  'orders-db': { url: 'postgres://localhost:5432/orders' },
                  reporting: { max: 2 },
                },
              },
            },
          }),
        }),
        ObservabilityModule,
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer())
      .get('/health')
      .expect(200)
      .expect((res) => {
        expect(res.body.status).toBe('ok');
      });
  });

  it('/ready (GET) reports every data source', async () => {
    const res = await request(app.getHttpServer()).get('/ready').expect(200);

    expect(res.body.status).toBe('ok');
    expect(res.body.checks.dataSources.mode).toBe('multiple');
    expect(res.body.checks.dataSources.pools).toEqual({
      ordersDb: {
        initialized: true,
        aliases: ['ordersDbDataSource'],
        total: 0,
        idle: 0,
        waiting: 0,
      },
      reporting: {
        initialized: true,
        aliases: ['reportingDataSource'],
        total: 0,
        idle: 0,
        waiting: 0,
      },
    });
  });

  it('/metrics (GET) exposes pool gauges', async () => {
    const res = await request(app.getHttpServer()).get('/metrics').expect(200);

    expect(res.text).toContain('# TYPE datasource_pool_connections gauge');
    expect(res.text).toContain('# TYPE datasource_pools_registered gauge');
    expect(res.text).toContain('datasource_pools_registered{mode="multiple"} 2');
  });
});
