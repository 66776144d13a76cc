import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { DataSource } from 'typeorm';

loadEnv();

export const connectionSource = new DataSource({
  type: 'postgres',
  host: process.env.TYPEORM_CLI_HOST ?? process.env.DB_HOST,
  port: Number(process.env.TYPEORM_CLI_PORT ?? process.env.DB_PORT ?? 5432),
  username: process.env.TYPEORM_CLI_USERNAME ?? process.env.DB_USER,
  password: process.env.TYPEORM_CLI_PASSWORD ?? process.env.DB_PASS,
  database: process.env.TYPEORM_CLI_DATABASE ?? process.env.DB_NAME,
  logging: true,
  synchronize: false,
  migrationsRun: false,
  entities: ['src/**/*.entity.ts'],
  migrations: ['src/migrations/*.ts'],
});
