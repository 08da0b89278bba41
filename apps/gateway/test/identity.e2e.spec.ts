// test/identity.e2e.spec.ts
import { Test } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import request from 'supertest';
import { validateEnv } from '@/config/env.schema';
import { AuthModule } from '@/modules/auth/auth.module';
import { HealthModule } from '@/modules/health/health.module';
import { DatabaseModule } from '@/modules/infra/database/database.module';
import { PG_POOL_FACTORY } from '@/modules/infra/database/database.config';
import { fakePoolFactory } from './fakes/fake-pg-pool';

const SUBJECT = '11111111-1111-1111-1111-111111111111';
const ENV = {
  JWT_SECRET: 'test-secret',
  PG_HOST: 'db.test',
  PG_PASSWORD: 'test-password',
  PG_POOL_MIN: '1',
  PG_POOL_MAX: '3',
};

describe('HTTP boundary (e2e)', () => {
  let app: INestApplication;
  let databaseUp = true;
  const fake = fakePoolFactory((sql) => {
    if (!databaseUp) throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    return sql === 'SELECT 1' ? { rows: [{ '?column?': 1 }] } : { rows: [] };
  });
  const signer = new JwtService({ secret: ENV.JWT_SECRET });
  const saved: Record<string, string | undefined> = {};

  beforeAll(async () => {
    for (const [k, v] of Object.entries(ENV)) {
      saved[k] = process.env[k];
      process.env[k] = v;
    }

    const moduleRef = await Test.createTestingModule({
      imports: [
        await ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateEnv }),
        DatabaseModule,
        AuthModule,
        HealthModule,
      ],
    })
      .overrideProvider(PG_POOL_FACTORY)
      .useValue(fake.factory)
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    for (const [k, v] of Object.entries(saved)) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  });

  it('opens one pool at startup with the configured bounds', () => {
    expect(fake.pools).toHaveLength(1);
    expect(fake.pools[0].config).toMatchObject({ host: 'db.test', min: 1, max: 3 });
  });

  it('GET /v1/auth/whoami -> 200 with the verified subject only', async () => {
    const token = signer.sign({ sub: SUBJECT, email: 'someone@example.com' }, { expiresIn: 3600 });

    const res = await request(app.getHttpServer())
      .get('/v1/auth/whoami')
      .set('Authorization', `Bearer ${token}`)
      .expect(200);

    expect(res.body).toEqual({ sub: SUBJECT, role: 'authenticated' });
  });

  it('GET /v1/auth/whoami -> 401 without a header', async () => {
    await request(app.getHttpServer()).get('/v1/auth/whoami').expect(401);
  });

  it('GET /v1/auth/whoami -> 401 for an expired token', async () => {
    const now = Math.floor(Date.now() / 1000);
    const token = signer.sign({ sub: SUBJECT, iat: now - 7200, exp: now - 3600 });

    await request(app.getHttpServer())
      .get('/v1/auth/whoami')
      .set('Authorization', `Bearer ${token}`)
      .expect(401);
  });

  it('GET /v1/auth/whoami -> 401 for another scheme', async () => {
    await request(app.getHttpServer())
      .get('/v1/auth/whoami')
      .set('Authorization', 'Basic dXNlcjpwYXNz')
      .expect(401);
  });

  it('GET /v1/health -> 200 after a round trip', async () => {
    const res = await request(app.getHttpServer()).get('/v1/health').expect(200);

    expect(res.body).toEqual({ status: 'ok', database: 'connected' });
    expect(fake.pools[0].queries.at(-1)).toEqual({ sql: 'SELECT 1', params: [] });
  });

  it('GET /v1/health -> 503 when the backend is unreachable', async () => {
    databaseUp = false;
    try {
      await request(app.getHttpServer()).get('/v1/health').expect(503);
    } finally {
      databaseUp = true;
    }
  });
});
