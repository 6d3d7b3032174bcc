/**
 * Object-store credential sources.
 *
 * Templates never embed credential literals; they receive one CredentialSource
 * and resolve it when rendering.
 */

import type { Credentials } from './schema.js';

export const ACCESS_KEY_ENV = 'LAKESTACK_S3_ACCESS_KEY';
export const SECRET_KEY_ENV = 'LAKESTACK_S3_SECRET_KEY';

export interface CredentialSource {
  /** Where the credentials come from, for status output */
  description: string;
  resolve(): Credentials;
}

export function staticCredentials(credentials: Credentials): CredentialSource {
  const frozen: Credentials = { ...credentials };
  return {
    description: 'configuration',
    resolve: () => ({ ...frozen }),
  };
}

/**
 * Read credentials from the environment, falling back per field
 */
export function envCredentials(
  fallback: Credentials,
  env: NodeJS.ProcessEnv = process.env
): CredentialSource {
  const accessKey = env[ACCESS_KEY_ENV];
  const secretKey = env[SECRET_KEY_ENV];
  const fromEnv = Boolean(accessKey) || Boolean(secretKey);

  return {
    description: fromEnv ? `environment (${ACCESS_KEY_ENV}/${SECRET_KEY_ENV})` : 'configuration',
    resolve: () => ({
      accessKey: accessKey || fallback.accessKey,
      secretKey: secretKey || fallback.secretKey,
    }),
  };
}
