// src/config/env.ts
//
// Environment-driven settings. The core never reads process.env outside
// this module (the S3 client's own credential chain aside).

import { ObjectCannedACL, S3ClientConfig } from '@aws-sdk/client-s3';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_ACL, DEFAULT_CONCURRENCY } from '../core/types.js';
import { LogLevel, isLogLevel } from '../utils/logger.js';

export interface EnvConfig {
  clientConfig: S3ClientConfig;
  acl: ObjectCannedACL;
  concurrency: number;
  logLevel: LogLevel;
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const CANNED_ACLS: readonly string[] = Object.values(ObjectCannedACL);

function isCannedAcl(value: string): value is ObjectCannedACL {
  return CANNED_ACLS.includes(value);
}

function readBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be true or false, got '${value}'`);
  }
}

function readPositiveInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Read settings from the environment:
 *
 *   AWS_REGION                      S3 region
 *   AWS_PROFILE                     shared-credentials profile
 *   PATHBRIDGE_S3_ENDPOINT          custom endpoint (MinIO, LocalStack...)
 *   PATHBRIDGE_S3_FORCE_PATH_STYLE  true|false
 *   PATHBRIDGE_ACL                  canned ACL for writes
 *   PATHBRIDGE_CONCURRENCY          fan-out width for directory copies
 *   PATHBRIDGE_LOG_LEVEL            debug|info|warn|error
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const clientConfig: S3ClientConfig = {};

  if (env.AWS_REGION) clientConfig.region = env.AWS_REGION;
  if (env.AWS_PROFILE) clientConfig.profile = env.AWS_PROFILE;
  if (env.PATHBRIDGE_S3_ENDPOINT) {
    try {
      new URL(env.PATHBRIDGE_S3_ENDPOINT);
    } catch (error) {
      throw new ConfigError(`PATHBRIDGE_S3_ENDPOINT is not a valid URL: '${env.PATHBRIDGE_S3_ENDPOINT}'`, undefined, {
        cause: error,
      });
    }
    clientConfig.endpoint = env.PATHBRIDGE_S3_ENDPOINT;
  }
  if (env.PATHBRIDGE_S3_FORCE_PATH_STYLE) {
    clientConfig.forcePathStyle = readBoolean('PATHBRIDGE_S3_FORCE_PATH_STYLE', env.PATHBRIDGE_S3_FORCE_PATH_STYLE);
  }

  let acl = DEFAULT_ACL;
  if (env.PATHBRIDGE_ACL) {
    if (!isCannedAcl(env.PATHBRIDGE_ACL)) {
      throw new ConfigError(`PATHBRIDGE_ACL must be one of ${CANNED_ACLS.join(', ')}; got '${env.PATHBRIDGE_ACL}'`);
    }
    acl = env.PATHBRIDGE_ACL;
  }

  const concurrency = env.PATHBRIDGE_CONCURRENCY
    ? readPositiveInteger('PATHBRIDGE_CONCURRENCY', env.PATHBRIDGE_CONCURRENCY)
    : DEFAULT_CONCURRENCY;

  let logLevel = DEFAULT_LOG_LEVEL;
  if (env.PATHBRIDGE_LOG_LEVEL) {
    const level = env.PATHBRIDGE_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`PATHBRIDGE_LOG_LEVEL must be debug, info, warn or error; got '${env.PATHBRIDGE_LOG_LEVEL}'`);
    }
    logLevel = level;
  }

  return { clientConfig, acl, concurrency, logLevel };
}
