/**
 * Ephemeral OAuth callback server.
 *
 * Listens on an OS-assigned local port, receives the provider redirect at
 * `GET /callback`, checks the anti-CSRF state and exchanges the code for an
 * access token. Exactly one result is published per instance.
 *
 * Lifecycle: created -> listening -> completed -> closed. `close()` may be
 * called from any state and more than once.
 */

import * as crypto from 'crypto';
import * as http from 'http';
import { AuthError, errorMessage } from '../types/auth-error';
import { AUTHORIZATION_TIMEOUT_MS } from '../config/endpoints';
import type { IdentityClient } from './identity-client';

export const CALLBACK_PATH = '/callback';

/**
 * Outcome handed from the server to the waiting login flow.
 */
export type CallbackResult = { accessToken: string } | { error: AuthError };

export type CallbackServerState = 'created' | 'listening' | 'completed' | 'closed';

export interface OAuthCallbackServerOptions {
  expectedState: string;
  codeVerifier: string;
  /** Provider page the browser is redirected to after a successful exchange */
  successUrl: string;
  identity: Pick<IdentityClient, 'exchangeCode'>;
  /** Interface to bind; all interfaces when omitted */
  host?: string;
}

export interface WaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function createDeferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

/**
 * Constant-time comparison of the received and expected state.
 */
function statesMatch(received: string, expected: string): boolean {
  const a = Buffer.from(received, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function formatTimeout(ms: number): string {
  if (ms % 60000 === 0) {
    const minutes = ms / 60000;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  if (ms % 1000 === 0) {
    return `${ms / 1000} seconds`;
  }
  return `${ms}ms`;
}

function isServerNotRunning(err: Error): boolean {
  return 'code' in err && err.code === 'ERR_SERVER_NOT_RUNNING';
}

export class OAuthCallbackServer {
  private server: http.Server | null = null;
  private lifecycle: CallbackServerState = 'created';
  private port = 0;
  private handled = false;
  private published = false;
  private readonly result = createDeferred<CallbackResult>();

  constructor(private readonly options: OAuthCallbackServerOptions) {}

  get state(): CallbackServerState {
    return this.lifecycle;
  }

  /**
   * Redirect URI registered with the provider for this attempt.
   */
  get redirectUri(): string {
    if (this.lifecycle === 'created') {
      throw new Error('callback server has not been started');
    }
    return `http://localhost:${this.port}${CALLBACK_PATH}`;
  }

  /**
   * Bind to an ephemeral port and start serving.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== 'created') {
      throw new Error(`callback server cannot start from state "${this.lifecycle}"`);
    }

    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err) => {
        this.publish({
          error: new AuthError('CallbackServerFailed', `failed to handle callback: ${errorMessage(err)}`, err),
        });
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new AuthError('CallbackServerFailed', `failed to listen on local port: ${err.message}`, err));
      };
      server.once('error', onError);
      server.listen(0, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      throw new AuthError('CallbackServerFailed', 'failed to determine local callback port');
    }

    server.on('error', (err) => {
      this.publish({
        error: new AuthError('CallbackServerFailed', `failed to serve requests: ${err.message}`, err),
      });
    });

    this.server = server;
    this.port = address.port;
    this.lifecycle = 'listening';
  }

  /**
   * Resolve with the access token, or reject with the published error, the
   * timeout (`AuthorizationTimeout`) or the abort signal (`Cancelled`),
   * whichever comes first.
   */
  async waitForResult(options: WaitOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? AUTHORIZATION_TIMEOUT_MS;
    const signal = options.signal;

    if (signal?.aborted) {
      throw new AuthError('Cancelled', 'login cancelled');
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const aborted = new Promise<CallbackResult>((resolve) => {
      if (!signal) return;
      onAbort = () => resolve({ error: new AuthError('Cancelled', 'login cancelled') });
      signal.addEventListener('abort', onAbort, { once: true });
    });
    const timedOut = new Promise<CallbackResult>((resolve) => {
      timer = setTimeout(() => {
        resolve({
          error: new AuthError(
            'AuthorizationTimeout',
            `authorization timeout - no callback received within ${formatTimeout(timeoutMs)}`
          ),
        });
      }, timeoutMs);
    });

    try {
      const outcome = await Promise.race([aborted, this.result.promise, timedOut]);
      if ('error' in outcome) {
        throw outcome.error;
      }
      return outcome.accessToken;
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  /**
   * Stop listening and drop open connections. Idempotent.
   */
  async close(): Promise<void> {
    if (this.lifecycle === 'closed') {
      return;
    }
    const server = this.server;
    this.server = null;
    this.lifecycle = 'closed';
    this.publish({
      error: new AuthError('Cancelled', 'callback server closed before authorization completed'),
    });

    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err && !isServerNotRunning(err)) {
          reject(err);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });
  }

  private publish(result: CallbackResult): void {
    if (this.published) {
      return;
    }
    this.published = true;
    if (this.lifecycle === 'listening') {
      this.lifecycle = 'completed';
    }
    this.result.resolve(result);
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method !== 'GET' || url.pathname !== CALLBACK_PATH) {
      respond(res, 404, 'Not found');
      return;
    }

    if (this.handled) {
      respond(res, 410, 'Authorization already handled');
      return;
    }
    this.handled = true;

    const state = url.searchParams.get('state');
    if (state === null || !statesMatch(state, this.options.expectedState)) {
      respond(res, 400, 'Invalid state parameter');
      this.publish({ error: new AuthError('InvalidState', 'invalid state parameter') });
      return;
    }

    const code = url.searchParams.get('code');
    if (!code) {
      respond(res, 400, 'Missing authorization code');
      this.publish({ error: new AuthError('MissingCode', 'missing authorization code in callback') });
      return;
    }

    let accessToken: string;
    try {
      accessToken = await this.options.identity.exchangeCode({
        code,
        codeVerifier: this.options.codeVerifier,
        redirectUri: this.redirectUri,
      });
    } catch (err) {
      respond(res, 500, 'Failed to exchange authorization code for tokens');
      this.publish({
        error: new AuthError('ExchangeFailed', `failed to exchange code for tokens: ${errorMessage(err)}`, err),
      });
      return;
    }

    if (!res.destroyed) {
      res.writeHead(307, { location: this.options.successUrl, connection: 'close' });
      res.end();
    }
    this.publish({ accessToken });
  }
}

function respond(res: http.ServerResponse, status: number, body: string): void {
  if (res.destroyed || res.writableEnded) {
    return;
  }
  res.writeHead(status, { 'content-type': 'text/plain; charset=utf-8', connection: 'close' });
  res.end(body);
}

/**
 * Wait for the server's one-shot result, bounded by a timeout and an abort
 * signal.
 */
export function waitForCallback(server: OAuthCallbackServer, options: WaitOptions = {}): Promise<string> {
  return server.waitForResult(options);
}
