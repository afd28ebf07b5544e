import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { CustomNamingStrategy } from './custom-naming.strategy';

export type DatabaseProvider = 'postgres' | 'better-sqlite3';

/**
 * Minimal view over the environment so the same builder serves
 * ConfigService, process.env and test fixtures.
 */
export interface DatabaseEnv {
  get(key: string): string | undefined;
}

export function resolveDatabaseProvider(value: string | undefined): DatabaseProvider {
  return value === 'better-sqlite3' ? 'better-sqlite3' : 'postgres';
}

/**
 * TypeORM options shared by AppModule and the migration DataSource.
 * PostgreSQL is the production target; better-sqlite3 backs local runs and tests.
 */
export function buildTypeOrmOptions(env: DatabaseEnv): TypeOrmModuleOptions {
  const synchronize = (env.get('DB_SYNCHRONIZE') ?? 'false') === 'true';
  const logging = (env.get('DB_LOGGING') ?? 'false') === 'true';

  if (resolveDatabaseProvider(env.get('DB_PROVIDER')) === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: env.get('DB_DATABASE') ?? ':memory:',
      namingStrategy: new CustomNamingStrategy(),
      autoLoadEntities: true,
      synchronize,
      logging,
    };
  }

  return {
    type: 'postgres',
    host: env.get('DB_HOST') ?? 'localhost',
    port: parseInt(env.get('DB_PORT') ?? '5432', 10),
    username: env.get('DB_USERNAME') ?? 'postgres',
    password: env.get('DB_PASSWORD') ?? '',
    database: env.get('DB_DATABASE') ?? 'deald_feedback',
    namingStrategy: new CustomNamingStrategy(),
    autoLoadEntities: true,
    migrations: [__dirname + '/../db/migrations/**/*{.ts,.js}'],
    migrationsTableName: 'typeorm_migrations',
    synchronize,
    logging,
  };
}
