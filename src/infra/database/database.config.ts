import { boolOr, intOr } from '@common/config/env-parsers';
import { parseBool } from '@common/parse-bool.fn';
import {
  IsBoolean,
  IsDefined,
  IsInt,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { UseEnv } from '@common/config/use-env.decorator';
import { ConfigFragment } from '@common/config/config-fragment';
import { LoggerOptions } from 'typeorm';

const LOG_OPTIONS = [
  'query',
  'schema',
  'error',
  'warn',
  'info',
  'log',
  'migration',
] as const;

type LogOption = (typeof LOG_OPTIONS)[number];

function isLogOption(candidate: string): candidate is LogOption {
  return LOG_OPTIONS.some((option) => option === candidate);
}

/** PEM text kept on one line in .env files */
function decodeCertificate(encoded?: string): string | undefined {
  if (!encoded) {
    return undefined;
  }

  const pem = Buffer.from(encoded.trim(), 'base64').toString('utf-8');
  if (!pem.includes('-----BEGIN')) {
    throw new Error('DB_CERT_BASE64 does not hold a PEM certificate');
  }
  return pem;
}

const parseLogOptions: (raw?: string) => LoggerOptions = (raw?: string) => {
  if (!raw) {
    return false;
  }

  if (['true', 'false', 'yes', 'no'].includes(raw)) {
    return parseBool(raw);
  }

  if (raw === 'all') {
    return 'all';
  }

  return raw
    .split(',')
    .map((option) => option.trim())
    .filter(isLogOption);
};

export class DatabaseConfig extends ConfigFragment {
  @IsString()
  @UseEnv('DB_HOST')
  public readonly host!: string;

  @IsInt()
  @UseEnv('DB_PORT', intOr(5432))
  public readonly port!: number;

  @IsString()
  @UseEnv('DB_NAME')
  public readonly database!: string;

  @IsString()
  @UseEnv('DB_USER')
  public readonly username!: string;

  @IsString()
  @UseEnv('DB_PASS')
  public readonly password!: string;

  @IsDefined()
  @UseEnv('DB_LOG', parseLogOptions)
  public readonly log!: LoggerOptions;

  @IsBoolean()
  @UseEnv('DB_SYNC', boolOr(false))
  public readonly sync!: boolean;

  @IsBoolean()
  @UseEnv('DB_MIGRATE', boolOr(true))
  public readonly migrate!: boolean;

  /** Connections kept by the pg pool; request workers share them */
  @IsInt()
  @Min(1)
  @UseEnv('DB_POOL_SIZE', intOr(10))
  public readonly poolSize!: number;

  /**
   * Waiting longer than this for a connection fails the call with
   * ERR_STORE_UNAVAILABLE instead of queueing it
   */
  @IsInt()
  @Min(0)
  @UseEnv('DB_CONNECT_TIMEOUT_MS', intOr(5000))
  public readonly connectTimeoutMs!: number;

  /**
   * CA certificate of the database server, base64 encoded PEM.
   * TLS is off when unset.
   */
  @IsString()
  @IsOptional()
  @UseEnv('DB_CERT_BASE64', decodeCertificate)
  public readonly cert?: string;
}
