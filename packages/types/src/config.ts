/**
 * @module
 * Configuration schemas. Each package turns environment variables into a
 * plain object and checks it against one of these before anything starts.
 */

import { type } from "arktype";
import { duration, nonEmptyString, optionalInterval } from "./common.js";

/** Token signing and credential settings */
export const authConfig = type({
  privateKeyPath: nonEmptyString,
  publicKeyPath: nonEmptyString,
  accessTokenTtl: duration,
  refreshTokenTtl: duration,
  issuer: nonEmptyString,
  "audience?": nonEmptyString,
  passwordIterations: "number.integer >= 1000",
});

/** Postgres connection settings */
export const databaseConfig = type({
  host: nonEmptyString,
  port: "1 <= number.integer <= 65535",
  user: nonEmptyString,
  password: "string",
  database: nonEmptyString,
  sslMode: "'disable' | 'allow' | 'prefer' | 'require' | 'verify-full'",
  poolSize: "number.integer > 0",
});

/** HTTP server settings */
export const serverConfig = type({
  port: "1 <= number.integer <= 65535",
  env: "'development' | 'production' | 'test'",
  corsOrigin: nonEmptyString,
  tokenCleanupInterval: optionalInterval,
});

export type AuthConfigInput = typeof authConfig.infer;
export type DatabaseConfigInput = typeof databaseConfig.infer;
export type ServerConfigInput = typeof serverConfig.infer;
