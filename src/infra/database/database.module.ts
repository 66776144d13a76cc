import { getAppName } from '@common/env';
import { DatabaseConfig } from '@infra/database/database.config';
import { ProxyReportEntity } from '@modules/health/entities/proxy-report.entity';
import { StatusOutcomeEntity } from '@modules/health/entities/status-outcome.entity';
import { UsageStatisticEntity } from '@modules/health/entities/usage-statistic.entity';
import { ProviderEntity } from '@modules/pool/entities/provider.entity';
import { ProxyEntity } from '@modules/pool/entities/proxy.entity';
import { SourceEntity } from '@modules/pool/entities/source.entity';
import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Initial1792300000000 } from '../../migrations/1792300000000-Initial';
import { SeedStatusOutcomes1792300100000 } from '../../migrations/1792300100000-SeedStatusOutcomes';

export const ENTITIES = [
  SourceEntity,
  ProviderEntity,
  ProxyEntity,
  StatusOutcomeEntity,
  UsageStatisticEntity,
  ProxyReportEntity,
];

export const MIGRATIONS = [
  Initial1792300000000,
  SeedStatusOutcomes1792300100000,
];

/**
 * # PostgreSQL through TypeORM
 *
 * Pool size and connect timeout go to node-postgres as `extra`.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [
        {
          module: class DatabaseConfigModule {},
          providers: [DatabaseConfig],
          exports: [DatabaseConfig],
        },
      ],
      inject: [DatabaseConfig],
      useFactory: (config: DatabaseConfig) => ({
        type: 'postgres',
        applicationName: getAppName(),
        database: config.database,
        username: config.username,
        password: config.password,
        host: config.host,
        port: config.port,
        entities: ENTITIES,
        migrations: MIGRATIONS,
        migrationsRun: config.migrate,
        synchronize: config.sync,
        logging: config.log,
        ssl: config.cert ? { ca: config.cert } : false,
        extra: {
          max: config.poolSize,
          connectionTimeoutMillis: config.connectTimeoutMs,
        },
      }),
    }),
  ],
})
export class DatabaseModule {}
