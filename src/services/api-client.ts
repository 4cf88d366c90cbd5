import { z } from 'zod';
import { AuthError, errorMessage } from '../types/auth-error';
import { AUTH_ENDPOINTS, VALIDATION_TIMEOUT_MS } from '../config/endpoints';

const AuthInfoSchema = z.object({
  type: z.string().optional(),
  apiKey: z.object({
    publicKey: z.string(),
    name: z.string().optional(),
    created: z.string().optional(),
    project: z.object({
      id: z.string(),
      name: z.string().optional(),
      planType: z.string().optional(),
    }),
    issuingUser: z
      .object({
        id: z.string().optional(),
        name: z.string().optional(),
        email: z.string().optional(),
      })
      .optional(),
  }),
});

/**
 * Response of `GET /auth/info` for an API key.
 */
export type AuthInfo = z.infer<typeof AuthInfoSchema>;

const ApiErrorSchema = z.object({ message: z.string().optional() });

/**
 * Checks a combined `public:secret` key against the remote service.
 * This is the single source of truth that a key pair is usable.
 */
export interface ApiKeyValidator {
  validate(apiKey: string): Promise<AuthInfo>;
}

export interface RestApiClientOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs?: number;
  /** Aborts an in-flight request, e.g. on Ctrl+C */
  signal?: AbortSignal;
}

/**
 * Encode a combined key as an HTTP Basic authorization header value.
 */
export function basicAuthHeader(apiKey: string): string {
  return `Basic ${Buffer.from(apiKey, 'utf-8').toString('base64')}`;
}

/**
 * Signal for one request: the caller's signal, if any, bounded by a timeout.
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Minimal client for the public REST API.
 */
export class RestApiClient implements ApiKeyValidator {
  constructor(private readonly options: RestApiClientOptions) {}

  async validate(apiKey: string): Promise<AuthInfo> {
    let response: Response;
    try {
      response = await fetch(this.options.apiUrl + AUTH_ENDPOINTS.AUTH_INFO, {
        method: 'GET',
        headers: {
          accept: 'application/json',
          authorization: basicAuthHeader(apiKey),
          'user-agent': this.options.userAgent,
        },
        signal: requestSignal(this.options.timeoutMs ?? VALIDATION_TIMEOUT_MS, this.options.signal),
      });
    } catch (err) {
      if (this.options.signal?.aborted) {
        throw new AuthError('Cancelled', 'API call cancelled', err);
      }
      throw new AuthError('ValidationFailed', `API call failed: ${errorMessage(err)}`, err);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(
        'ValidationFailed',
        await apiErrorMessage(response, 'invalid API key: authentication failed')
      );
    }
    if (response.status !== 200) {
      throw new AuthError(
        'ValidationFailed',
        await apiErrorMessage(response, `unexpected API response: ${response.status}`)
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new AuthError('ValidationFailed', `failed to read API response: ${errorMessage(err)}`, err);
    }

    const parsed = AuthInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('ValidationFailed', 'empty or malformed response from API');
    }
    return parsed.data;
  }
}

/**
 * Prefer the server's `message` field, otherwise the fallback.
 */
async function apiErrorMessage(response: Response, fallback: string): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return fallback;
  }
  if (!text) {
    return fallback;
  }
  try {
    const parsed = ApiErrorSchema.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.message) {
      return parsed.data.message;
    }
  } catch {
    return fallback;
  }
  return fallback;
}
