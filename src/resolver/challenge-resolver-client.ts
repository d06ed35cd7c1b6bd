import axios, { AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import { z } from 'zod';
import { ResolverSettings } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { CircuitBreaker, CircuitOpenError } from '../utils/circuit-breaker.js';
import {
  ResolverError,
  ResolverRejected,
  ResolverTimeout,
  ResolverUnavailable,
  errorMessage,
} from '../utils/errors.js';
import { SessionCookie } from '../navigation/render-session.js';

const resolverCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expiry: z.number().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.string().optional(),
});

const resolverResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  solution: z
    .object({
      url: z.string().optional(),
      status: z.number().optional(),
      response: z.string(),
      cookies: z.array(resolverCookieSchema).default([]),
      userAgent: z.string().optional(),
    })
    .optional(),
});

type ResolverCookie = z.infer<typeof resolverCookieSchema>;

export interface ResolvedPage {
  /** HTTP status the resolver saw for the target page */
  status: number;
  html: string;
  cookies: SessionCookie[];
  userAgent: string | null;
  /** Final URL after the resolver followed redirects */
  url: string;
}

/**
 * Capability the Page Navigator needs from the challenge-resolution service.
 * A resolved page with no listings in it is still a successful resolution.
 */
export interface ChallengeResolver {
  resolve(url: string, timeoutMs?: number): Promise<ResolvedPage>;
}

// The resolver answers after maxTimeout at the latest; give the HTTP call headroom beyond that
const HTTP_TIMEOUT_HEADROOM_MS = 10000;

/**
 * HTTP client for a FlareSolverr-compatible challenge resolver.
 *
 * One attempt per call: retries belong to the Crawl Controller, which retries
 * whole pages. Calls are serialised through p-limit (the service drives a
 * single browser) and guarded by a circuit breaker so a dead service fails
 * fast instead of costing a full timeout per page.
 */
export class ChallengeResolverClient implements ChallengeResolver {
  private client: AxiosInstance;
  private circuitBreaker: CircuitBreaker;
  private limit: ReturnType<typeof pLimit>;
  private defaultTimeoutMs: number;

  constructor(settings: Pick<ResolverSettings, 'url' | 'timeoutMs' | 'maxConcurrency'>) {
    this.defaultTimeoutMs = settings.timeoutMs;
    this.client = axios.create({
      baseURL: settings.url,
      timeout: settings.timeoutMs + HTTP_TIMEOUT_HEADROOM_MS,
    });
    this.limit = pLimit(Math.max(1, settings.maxConcurrency));
    this.circuitBreaker = new CircuitBreaker({
      name: 'challenge-resolver',
      failureThreshold: 3,
      resetTimeout: 120000,
    });
  }

  async resolve(url: string, timeoutMs: number = this.defaultTimeoutMs): Promise<ResolvedPage> {
    return this.limit(async () => {
      try {
        // A page the service answered but could not solve says nothing about its health
        return await this.circuitBreaker.execute(
          () => this.request(url, timeoutMs),
          error => !(error instanceof ResolverRejected)
        );
      } catch (error) {
        if (error instanceof CircuitOpenError) {
          throw new ResolverUnavailable(error.message, url, { cause: error });
        }
        throw error;
      }
    });
  }

  getCircuitBreakerState(): 'CLOSED' | 'OPEN' | 'HALF_OPEN' {
    return this.circuitBreaker.getState();
  }

  private async request(url: string, timeoutMs: number): Promise<ResolvedPage> {
    const startedAt = Date.now();
    logger.debug('Challenge resolution request', { url, timeoutMs });

    const body = await this.client
      .post<unknown>(
        '',
        { cmd: 'request.get', url, maxTimeout: timeoutMs },
        { timeout: timeoutMs + HTTP_TIMEOUT_HEADROOM_MS }
      )
      .then(response => response.data)
      .catch((error: unknown) => {
        throw this.classifyTransportError(error, url, timeoutMs);
      });

    const parsed = resolverResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolverRejected(
        `Malformed resolver response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        url,
        null
      );
    }

    const { status, message, solution } = parsed.data;
    if (status !== 'ok' || !solution) {
      throw new ResolverRejected(message || `Resolver returned status "${status}"`, url, null);
    }

    logger.info('Challenge resolved', {
      url,
      status: solution.status,
      htmlLength: solution.response.length,
      cookieCount: solution.cookies.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      status: solution.status ?? 200,
      html: solution.response,
      cookies: solution.cookies.map(toSessionCookie),
      userAgent: solution.userAgent ?? null,
      url: solution.url ?? url,
    };
  }

  private classifyTransportError(error: unknown, url: string, timeoutMs: number): ResolverError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new ResolverTimeout(url, timeoutMs, { cause: error });
      }

      if (error.response) {
        const data: unknown = error.response.data;
        const parsed = resolverResponseSchema.safeParse(data);
        const detail = parsed.success && parsed.data.message ? `: ${parsed.data.message}` : '';
        return new ResolverRejected(`Resolver responded HTTP ${error.response.status}${detail}`, url, error.response.status, {
          cause: error,
        });
      }

      return new ResolverUnavailable(`Resolver unreachable: ${error.message}`, url, { cause: error });
    }

    return new ResolverUnavailable(`Resolver unreachable: ${errorMessage(error)}`, url, { cause: error });
  }
}

function toSessionCookie(cookie: ResolverCookie): SessionCookie {
  const sameSite = cookie.sameSite?.toLowerCase();
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires ?? cookie.expiry,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: sameSite === 'strict' ? 'Strict' : sameSite === 'lax' ? 'Lax' : sameSite === 'none' ? 'None' : undefined,
  };
}

export function createChallengeResolver(settings: ResolverSettings): ChallengeResolver | null {
  if (!settings.enabled) {
    logger.info('Challenge resolver disabled; failed pages will not be rescued');
    return null;
  }
  return new ChallengeResolverClient(settings);
}
