import type { AuthorityOutcome, AuthorityTransportPort } from '@permit/application';
import type { PermissionChange } from '@permit/domain';
import { z } from 'zod';
import { authorityOutcomeSchema, toWireRequest } from './PermissionChangeCodec';

const submitResponseSchema = z.object({
  accepted: z.array(z.string()),
});

const outcomesResponseSchema = z.object({
  outcomes: z.array(authorityOutcomeSchema),
});

const DEFAULT_TIMEOUT_MS = 10_000;

export type HttpAuthorityTransportOptions = Readonly<{
  baseUrl: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  headers?: Readonly<Record<string, string>>;
}>;

export class AuthorityTransportError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly payload?: unknown
  ) {
    super(message);
    this.name = 'AuthorityTransportError';
  }
}

const normalizeBaseUrl = (baseUrl: string): string =>
  baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const parseJson = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const extractErrorMessage = (payload: unknown): string | null => {
  if (!isObject(payload)) return null;
  if (isObject(payload.error) && typeof payload.error.message === 'string') {
    return payload.error.message;
  }
  if (typeof payload.error === 'string') return payload.error;
  if (typeof payload.message === 'string') return payload.message;
  return null;
};

/**
 * Talks to the authority over JSON/HTTP.
 *
 * - `POST /permission-changes` with `{ requests }` → `{ accepted }`
 * - `POST /permission-changes/status` with `{ ids }` → `{ outcomes }`
 */
export class HttpAuthorityTransport implements AuthorityTransportPort {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(options: HttpAuthorityTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
  }

  async submit(changes: readonly PermissionChange[]): Promise<string[]> {
    if (changes.length === 0) return [];
    const body = await this.postJson(
      '/permission-changes',
      { requests: changes.map(toWireRequest) },
      submitResponseSchema
    );
    return body.accepted;
  }

  async fetchOutcomes(ids: readonly string[]): Promise<AuthorityOutcome[]> {
    if (ids.length === 0) return [];
    const body = await this.postJson('/permission-changes/status', { ids }, outcomesResponseSchema);
    return body.outcomes;
  }

  private async postJson<TSchema extends z.ZodTypeAny>(
    path: string,
    payload: unknown,
    schema: TSchema
  ): Promise<z.output<TSchema>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json', ...this.headers },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const message =
        err instanceof Error
          ? `Network error calling ${path}: ${err.message}`
          : `Network error calling ${path}`;
      throw new AuthorityTransportError(message);
    }

    const body = await parseJson(response);
    if (!response.ok) {
      const reason = extractErrorMessage(body) ?? `Request to ${path} failed (status ${response.status})`;
      throw new AuthorityTransportError(reason, response.status, body);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AuthorityTransportError(`Unexpected response from ${path}`, response.status, body);
    }
    return parsed.data;
  }
}
