/**
 * OAuth and API endpoint configuration.
 *
 * This is the single source of truth for the URLs the login flow talks to.
 */

import type { CliConfig } from './types';

/**
 * Public OAuth client registered for the CLI.
 */
export const OAUTH_CLIENT_ID = 'cirrus-cli';

/**
 * Paths relative to the configured base URLs.
 */
export const AUTH_ENDPOINTS = {
  /** Authorization page, relative to the console URL */
  AUTHORIZE: '/oauth/authorize',
  /** Page the browser lands on after a successful callback */
  SUCCESS: '/oauth/code/success',
  /** Where users manage API keys */
  SETTINGS: '/dashboard/settings',
  /** Token exchange, relative to the gateway URL */
  TOKEN: '/idp/external/cli/token',
  /** GraphQL endpoint, relative to the gateway URL */
  GRAPHQL: '/query',
  /** Key validation, relative to the API URL */
  AUTH_INFO: '/auth/info',
} as const;

/** Upper bound on waiting for the browser callback. */
export const AUTHORIZATION_TIMEOUT_MS = 5 * 60 * 1000;

/** Per-request timeout for identity provider calls. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/** Timeout for the key validation call. */
export const VALIDATION_TIMEOUT_MS = 10000;

export interface OAuthEndpoints {
  authUrl: string;
  tokenUrl: string;
  successUrl: string;
  graphqlUrl: string;
  settingsUrl: string;
}

export function resolveOAuthEndpoints(config: Pick<CliConfig, 'consoleUrl' | 'gatewayUrl'>): OAuthEndpoints {
  return {
    authUrl: config.consoleUrl + AUTH_ENDPOINTS.AUTHORIZE,
    tokenUrl: config.gatewayUrl + AUTH_ENDPOINTS.TOKEN,
    successUrl: config.consoleUrl + AUTH_ENDPOINTS.SUCCESS,
    graphqlUrl: config.gatewayUrl + AUTH_ENDPOINTS.GRAPHQL,
    settingsUrl: config.consoleUrl + AUTH_ENDPOINTS.SETTINGS,
  };
}
