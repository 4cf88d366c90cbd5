/**
 * Remote identity client.
 *
 * Talks to the identity provider's token endpoint and to the GraphQL
 * operations that accept an OAuth access token: project listing, user
 * lookup and PAT (long-lived key pair) issuance.
 */

import { z } from 'zod';
import { AuthError, errorMessage } from '../types/auth-error';
import type { IdentityUser, IssuedKeyPair, Project } from '../types';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/endpoints';
import { requestSignal } from './api-client';

export interface TokenExchangeRequest {
  code: string;
  codeVerifier: string;
  redirectUri: string;
}

/**
 * Operations the login flow needs from the identity provider.
 */
export interface IdentityClient {
  exchangeCode(request: TokenExchangeRequest): Promise<string>;
  listAccessibleProjects(accessToken: string): Promise<Project[]>;
  getCurrentUser(accessToken: string): Promise<IdentityUser>;
  issueCredential(accessToken: string, projectId: string, label: string): Promise<IssuedKeyPair>;
}

export interface GraphQLIdentityClientOptions {
  clientId: string;
  tokenUrl: string;
  graphqlUrl: string;
  userAgent: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const GraphQLErrorSchema = z.object({ message: z.string() });

const ProjectsDataSchema = z.object({
  getAllProjects: z.array(z.object({ id: z.string(), name: z.string() })),
});

const UserDataSchema = z.object({
  getUser: z.object({
    id: z.string().optional(),
    name: z.string().nullish(),
    email: z.string().nullish(),
  }),
});

const CreatePatDataSchema = z.object({
  createPATRecord: z.object({
    clientCredentials: z.object({
      accessKey: z.string().min(1),
      secretKey: z.string().min(1),
    }),
  }),
});

const GET_ALL_PROJECTS_QUERY = `
  query GetAllProjects {
    getAllProjects {
      id
      name
    }
  }
`;

const GET_USER_QUERY = `
  query GetUser {
    getUser {
      id
      name
      email
    }
  }
`;

const CREATE_PAT_RECORD_MUTATION = `
  mutation CreatePATRecord($input: CreatePATRecordInput!) {
    createPATRecord(createPATRecordInput: $input) {
      clientCredentials {
        accessKey
        secretKey
      }
    }
  }
`;

/**
 * `IdentityClient` backed by `fetch`.
 */
export class GraphQLIdentityClient implements IdentityClient {
  private readonly timeoutMs: number;

  constructor(private readonly options: GraphQLIdentityClientOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async exchangeCode(request: TokenExchangeRequest): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code: request.code,
      code_verifier: request.codeVerifier,
      client_id: this.options.clientId,
      redirect_uri: request.redirectUri,
    });

    let response: Response;
    try {
      response = await fetch(this.options.tokenUrl, {
        method: 'POST',
        headers: {
          'content-type': 'application/x-www-form-urlencoded',
          accept: 'application/json',
          'user-agent': this.options.userAgent,
        },
        body: body.toString(),
        signal: requestSignal(this.timeoutMs, this.options.signal),
      });
    } catch (err) {
      this.throwIfCancelled(err);
      throw new AuthError('ExchangeFailed', `token request failed: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      throw new AuthError('ExchangeFailed', `token endpoint returned status ${response.status}`);
    }

    const parsed = TokenResponseSchema.safeParse(await readJson(response, 'ExchangeFailed'));
    if (!parsed.success) {
      throw new AuthError('ExchangeFailed', 'token response did not contain an access token');
    }
    return parsed.data.access_token;
  }

  async listAccessibleProjects(accessToken: string): Promise<Project[]> {
    const data = await this.request(accessToken, GET_ALL_PROJECTS_QUERY, undefined, ProjectsDataSchema);
    return data.getAllProjects.map((p) => ({ id: p.id, name: p.name }));
  }

  async getCurrentUser(accessToken: string): Promise<IdentityUser> {
    const data = await this.request(accessToken, GET_USER_QUERY, undefined, UserDataSchema);
    return {
      id: data.getUser.id,
      name: data.getUser.name ?? undefined,
      email: data.getUser.email ?? undefined,
    };
  }

  async issueCredential(accessToken: string, projectId: string, label: string): Promise<IssuedKeyPair> {
    const data = await this.request(
      accessToken,
      CREATE_PAT_RECORD_MUTATION,
      { input: { projectId, name: label } },
      CreatePatDataSchema
    );
    const { accessKey, secretKey } = data.createPATRecord.clientCredentials;
    return { publicKey: accessKey, secretKey };
  }

  private throwIfCancelled(cause: unknown): void {
    if (this.options.signal?.aborted) {
      throw new AuthError('Cancelled', 'request cancelled', cause);
    }
  }

  private async request<T>(
    accessToken: string,
    query: string,
    variables: Record<string, unknown> | undefined,
    schema: z.ZodType<T>
  ): Promise<T> {
    const payload: Record<string, unknown> = { query };
    if (variables) {
      payload.variables = variables;
    }

    let response: Response;
    try {
      response = await fetch(this.options.graphqlUrl, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${accessToken}`,
          'user-agent': this.options.userAgent,
        },
        body: JSON.stringify(payload),
        signal: requestSignal(this.timeoutMs, this.options.signal),
      });
    } catch (err) {
      this.throwIfCancelled(err);
      throw new AuthError('RemoteRequestFailed', `failed to make GraphQL request: ${errorMessage(err)}`, err);
    }

    if (response.status !== 200) {
      throw new AuthError('RemoteRequestFailed', `GraphQL request failed with status ${response.status}`);
    }

    const body = await readJson(response, 'RemoteRequestFailed');
    const envelope = z
      .object({
        data: z.unknown().optional(),
        errors: z.array(GraphQLErrorSchema).optional(),
      })
      .safeParse(body);
    if (!envelope.success) {
      throw new AuthError('RemoteRequestFailed', 'failed to unmarshal GraphQL response');
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      throw new AuthError(
        'RemoteRequestFailed',
        `GraphQL errors: ${errors.map((e) => e.message).join('; ')}`
      );
    }

    if (envelope.data.data === undefined || envelope.data.data === null) {
      throw new AuthError('RemoteRequestFailed', 'GraphQL response contains no data');
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new AuthError('RemoteRequestFailed', 'GraphQL response has an unexpected shape');
    }
    return data.data;
  }
}

async function readJson(response: Response, kind: 'ExchangeFailed' | 'RemoteRequestFailed'): Promise<unknown> {
  try {
    return await response.json();
  } catch (err) {
    throw new AuthError(kind, `failed to read response body: ${errorMessage(err)}`, err);
  }
}
