/**
 * Login orchestration.
 *
 * Decides between explicit keys and the browser OAuth/PKCE flow, validates
 * whatever key pair it ends up with, and only then persists it. Every
 * collaborator is injected so the flow can run without a browser, a
 * terminal or the network.
 */

import { AuthError, errorMessage, isAuthError, wrapAuthError, type AuthErrorKind } from '../types/auth-error';
import {
  combineApiKey,
  type ExplicitKeys,
  type IdentityUser,
  type IssuedCredential,
  type Project,
} from '../types';
import type { OAuthEndpoints } from '../config/endpoints';
import type { ApiKeyValidator, AuthInfo } from './api-client';
import type { BrowserOpener } from './browser';
import type { CredentialField, CredentialPrompt } from './credential-prompt';
import type { CredentialStore } from './credential-store';
import type { IdentityClient } from './identity-client';
import type { OutputSink } from './console-output';
import type { ProjectSelector } from './project-selector';
import { OAuthCallbackServer, waitForCallback } from './oauth-callback-server';
import { buildAuthorizationUrl, generatePkceParameters, type RandomSource } from './pkce';
import { redactSecrets } from './redact';

/**
 * Environment variables consulted when a flag is not given.
 */
export const CREDENTIAL_ENV_VARS: Record<CredentialField, string> = {
  publicKey: 'CIRRUS_PUBLIC_KEY',
  secretKey: 'CIRRUS_SECRET_KEY',
  projectId: 'CIRRUS_PROJECT_ID',
};

const CREDENTIAL_FIELDS: readonly CredentialField[] = ['publicKey', 'secretKey', 'projectId'];

export const CREDENTIAL_LABEL_PREFIX = 'Cirrus CLI';

/** Issuance error text that means the project has no room for another key. */
export const TOKEN_LIMIT_MARKER = 'reached maximum token limit for project';

export interface LoginDependencies {
  store: Pick<CredentialStore, 'store'>;
  identity: IdentityClient;
  validator: ApiKeyValidator;
  endpoints: OAuthEndpoints;
  clientId: string;
  openBrowser: BrowserOpener;
  selectProject: ProjectSelector;
  promptForCredentials: CredentialPrompt;
  isTTY: () => boolean;
  hostname: () => string;
  env: Record<string, string | undefined>;
  output: OutputSink;
  /** Aborting cancels the flow at its next remote call or stage boundary */
  signal?: AbortSignal;
  /** Bound on waiting for the browser callback */
  timeoutMs?: number;
  randomSource?: RandomSource;
}

export interface LoginResult extends IssuedCredential {
  authInfo: AuthInfo;
}

function present(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Label shown next to the issued key in the console.
 */
export function buildCredentialLabel(user: IdentityUser, hostname: string): string {
  const identity = present(user.name) ?? present(user.email) ?? present(hostname);
  return identity ? `${CREDENTIAL_LABEL_PREFIX} - ${identity}` : CREDENTIAL_LABEL_PREFIX;
}

export class LoginOrchestrator {
  constructor(private readonly deps: LoginDependencies) {}

  /**
   * Obtain, validate and store a credential. Nothing is written unless the
   * validation call accepts the key and it belongs to the resolved project.
   */
  async login(explicit: ExplicitKeys = {}): Promise<LoginResult> {
    const resolved = this.resolveExplicitKeys(explicit);
    const anyGiven = CREDENTIAL_FIELDS.some((field) => resolved[field] !== undefined);

    const issued = anyGiven ? await this.completeExplicitKeys(resolved) : await this.loginWithOAuth();
    const apiKey = combineApiKey(issued.publicKey, issued.secretKey);
    const secrets = [apiKey, issued.secretKey];

    let authInfo: AuthInfo;
    try {
      authInfo = await this.deps.output.progress('Validating API key...', () =>
        this.untilCancelled(this.deps.validator.validate(apiKey))
      );
    } catch (err) {
      throw this.stageError('API key validation failed', err, secrets, 'ValidationFailed');
    }

    const validatedProject = authInfo.apiKey.project.id;
    if (validatedProject !== issued.projectId) {
      throw new AuthError(
        'ValidationFailed',
        `API key validation failed: key belongs to project ${validatedProject}, not ${issued.projectId}`
      );
    }

    this.throwIfCancelled();
    try {
      await this.deps.store.store(apiKey, issued.projectId);
    } catch (err) {
      throw this.stageError('failed to store credentials', err, secrets, 'StorageFailed');
    }

    return { ...issued, authInfo };
  }

  /**
   * Flag value wins over the environment; empty strings count as absent.
   */
  resolveExplicitKeys(explicit: ExplicitKeys): ExplicitKeys {
    const resolved: ExplicitKeys = {};
    for (const field of CREDENTIAL_FIELDS) {
      resolved[field] = present(explicit[field]) ?? present(this.deps.env[CREDENTIAL_ENV_VARS[field]]);
    }
    return resolved;
  }

  private async completeExplicitKeys(resolved: ExplicitKeys): Promise<IssuedCredential> {
    const missing = CREDENTIAL_FIELDS.filter((field) => resolved[field] === undefined);
    let values = resolved;

    if (missing.length > 0) {
      if (!this.deps.isTTY()) {
        throw new AuthError(
          'NoTTY',
          'TTY not detected - credentials required. Use flags (--public-key, --secret-key, --project-id) ' +
            'or environment variables (CIRRUS_PUBLIC_KEY, CIRRUS_SECRET_KEY, CIRRUS_PROJECT_ID)'
        );
      }
      this.deps.output.info(`You can find your API credentials at: ${this.deps.endpoints.settingsUrl}`);

      const answers = await this.deps.promptForCredentials(missing);
      values = { ...resolved };
      for (const field of missing) {
        values[field] = present(answers[field]);
      }
    }

    const { publicKey, secretKey, projectId } = values;
    if (!publicKey || !secretKey || !projectId) {
      throw new AuthError('MissingCredentials', 'public key, secret key and project ID are all required');
    }
    return { publicKey, secretKey, projectId };
  }

  private async loginWithOAuth(): Promise<IssuedCredential> {
    let accessToken: string;
    try {
      accessToken = await this.authenticate();
    } catch (err) {
      throw this.stageError('failed to authenticate via OAuth', err);
    }

    let projectId: string;
    try {
      this.throwIfCancelled();
      projectId = await this.chooseProject(accessToken);
    } catch (err) {
      throw this.stageError('failed to select project', err);
    }

    try {
      this.throwIfCancelled();
      return await this.createCredentials(accessToken, projectId);
    } catch (err) {
      throw this.stageError('failed to create credentials', err);
    }
  }

  /**
   * Run the PKCE round trip through the browser and return the access token.
   */
  private async authenticate(): Promise<string> {
    const { endpoints, output } = this.deps;
    const pkce = generatePkceParameters(this.deps.randomSource);
    const server = new OAuthCallbackServer({
      expectedState: pkce.state,
      codeVerifier: pkce.verifier,
      successUrl: endpoints.successUrl,
      identity: this.deps.identity,
    });

    try {
      await server.start();

      const authUrl = buildAuthorizationUrl({
        authUrl: endpoints.authUrl,
        clientId: this.deps.clientId,
        redirectUri: server.redirectUri,
        challenge: pkce.challenge,
        state: pkce.state,
      });

      output.info(`Auth URL is: ${authUrl}`);
      output.info('Opening browser for authentication...');
      try {
        await this.deps.openBrowser(authUrl);
      } catch (err) {
        output.warn(`Failed to open browser: ${errorMessage(err)}\nPlease manually navigate to the Auth URL.`);
      }

      return await waitForCallback(server, {
        timeoutMs: this.deps.timeoutMs,
        signal: this.deps.signal,
      });
    } finally {
      await server.close();
    }
  }

  private async chooseProject(accessToken: string): Promise<string> {
    let projects: Project[];
    try {
      projects = await this.untilCancelled(this.deps.identity.listAccessibleProjects(accessToken));
    } catch (err) {
      throw wrapAuthError('failed to get user projects', err);
    }

    if (projects.length === 0) {
      throw new AuthError('NoAccessibleProjects', 'user has no accessible projects');
    }
    if (projects.length === 1) {
      return projects[0].id;
    }
    return this.deps.selectProject(projects);
  }

  private async createCredentials(accessToken: string, projectId: string): Promise<IssuedCredential> {
    let user: IdentityUser;
    try {
      user = await this.untilCancelled(this.deps.identity.getCurrentUser(accessToken));
    } catch (err) {
      throw wrapAuthError('failed to get user info', err);
    }

    const label = buildCredentialLabel(user, this.deps.hostname());
    this.throwIfCancelled();
    try {
      const pair = await this.untilCancelled(this.deps.identity.issueCredential(accessToken, projectId, label));
      return { ...pair, projectId };
    } catch (err) {
      if (errorMessage(err).includes(TOKEN_LIMIT_MARKER)) {
        throw new AuthError(
          kindOf(err),
          `failed to create API key: ${errorMessage(err)}\n\n` +
            `You can delete existing API keys at: ${this.deps.endpoints.settingsUrl}`,
          err
        );
      }
      throw wrapAuthError('failed to create PAT record', err);
    }
  }

  private throwIfCancelled(): void {
    if (this.deps.signal?.aborted) {
      throw new AuthError('Cancelled', 'login cancelled');
    }
  }

  /**
   * Settle with `task`, or reject with `Cancelled` as soon as the signal
   * aborts. The task itself is left to its own abort handling.
   */
  private async untilCancelled<T>(task: Promise<T>): Promise<T> {
    const { signal } = this.deps;
    if (!signal) {
      return task;
    }

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(new AuthError('Cancelled', 'login cancelled'));
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
    try {
      return await Promise.race([aborted, task]);
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  /**
   * Prefix the stage, keep the kind, and mask any secret in the message.
   */
  private stageError(
    stage: string,
    err: unknown,
    secrets: readonly string[] = [],
    fallbackKind: AuthErrorKind = 'RemoteRequestFailed'
  ): AuthError {
    const wrapped = wrapAuthError(stage, err, fallbackKind);
    return new AuthError(wrapped.kind, redactSecrets(wrapped.message, secrets), err);
  }
}

function kindOf(err: unknown): AuthErrorKind {
  return isAuthError(err) ? err.kind : 'RemoteRequestFailed';
}
