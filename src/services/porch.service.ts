import http from 'node:http';
import https from 'node:https';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { PorchErrors } from '../lib/errors/porch-errors.js';
import type { ClusterClient } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

const log = createLogger('Porch');

export const PORCH_API_PATH = '/apis/porch.kpt.dev/v1alpha1/namespaces/default';
export const TOKEN_NAMESPACE = 'karmada-system';
export const TOKEN_SERVICE_ACCOUNT = 'karmada-dashboard';
export const TOKEN_AUDIENCE = 'https://kubernetes.default.svc.cluster.local';
export const TOKEN_LIFETIME_SECONDS = 3600;
const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export const PORCH_RESOURCES = {
  repository: 'repositories',
  packagerevision: 'packagerevisions',
  packagerevisionresources: 'packagerevisionresources',
} as const;

export type PorchResource = keyof typeof PORCH_RESOURCES;

export interface PorchRequest {
  method: string;
  headers: Record<string, string>;
  body?: Uint8Array;
}

export interface PorchResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface PorchTransport {
  send(url: URL, request: PorchRequest): Promise<PorchResponse>;
}

const HOP_BY_HOP = new Set(['connection', 'keep-alive', 'transfer-encoding', 'upgrade']);

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP.has(name)) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

/** Node http(s) transport; `insecure` skips verification of the Porch certificate. */
export class NodePorchTransport implements PorchTransport {
  private agent: https.Agent;

  constructor(insecure: boolean) {
    this.agent = new https.Agent({ rejectUnauthorized: !insecure });
  }

  send(url: URL, request: PorchRequest): Promise<PorchResponse> {
    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 502,
            headers: flattenHeaders(res.headers),
            body: Buffer.concat(chunks),
          });
        });
      };
      const options: https.RequestOptions = { method: request.method, headers: request.headers };
      const req =
        url.protocol === 'https:'
          ? https.request(url, { ...options, agent: this.agent }, onResponse)
          : http.request(url, options, onResponse);
      req.on('error', reject);
      if (request.body && request.body.length > 0) req.write(request.body);
      req.end();
    });
  }
}

interface CachedToken {
  token: string;
  expiresAt: Date;
}

/** Service-account tokens for the Porch API, refreshed five minutes before expiry. */
export class ServiceAccountTokenCache {
  private cache = new Map<string, CachedToken>();

  constructor(
    private client: () => ClusterClient,
    private now: () => Date = () => new Date()
  ) {}

  async token(key = `${TOKEN_NAMESPACE}/${TOKEN_SERVICE_ACCOUNT}`): Promise<Result<string, AppError>> {
    const cached = this.cache.get(key);
    if (cached && this.now().getTime() + TOKEN_REFRESH_MARGIN_MS < cached.expiresAt.getTime()) {
      return ok(cached.token);
    }

    try {
      const issued = await this.client().createServiceAccountToken(TOKEN_NAMESPACE, TOKEN_SERVICE_ACCOUNT, {
        audiences: [TOKEN_AUDIENCE],
        expirationSeconds: TOKEN_LIFETIME_SECONDS,
      });
      this.cache.set(key, { token: issued.token, expiresAt: issued.expiresAt });
      log.debug('Issued Porch service account token', { data: { key, expiresAt: issued.expiresAt.toISOString() } });
      return ok(issued.token);
    } catch (error) {
      return err(PorchErrors.TOKEN_FAILED(errorMessage(error)));
    }
  }
}

export interface PorchServiceDeps {
  apiUrl?: string;
  transport: PorchTransport;
  tokens: ServiceAccountTokenCache;
}

export interface ProxyInput {
  method: string;
  headers: Headers;
  search: string;
  body?: Uint8Array;
}

export class PorchService {
  constructor(private deps: PorchServiceDeps) {}

  get configured(): boolean {
    return Boolean(this.deps.apiUrl);
  }

  upstreamUrl(resource: PorchResource, name: string | undefined, search: string): Result<URL, AppError> {
    if (!this.deps.apiUrl) return err(PorchErrors.NOT_CONFIGURED);
    const base = this.deps.apiUrl.replace(/\/+$/, '');
    const path = `${PORCH_API_PATH}/${PORCH_RESOURCES[resource]}${name ? `/${encodeURIComponent(name)}` : ''}`;
    return ok(new URL(`${base}${path}${search}`));
  }

  async proxy(resource: PorchResource, name: string | undefined, input: ProxyInput): Promise<Result<PorchResponse, AppError>> {
    const url = this.upstreamUrl(resource, name, input.search);
    if (!url.ok) return url;

    const token = await this.deps.tokens.token();
    if (!token.ok) return token;

    const headers: Record<string, string> = {};
    input.headers.forEach((value, header) => {
      if (header === 'authorization' || header === 'host') return;
      headers[header] = value;
    });
    headers.authorization = `Bearer ${token.value}`;

    try {
      const response = await this.deps.transport.send(url.value, {
        method: input.method,
        headers,
        body: input.body,
      });
      log.debug('Porch request', { data: { method: input.method, path: url.value.pathname, status: response.status } });
      return ok(response);
    } catch (error) {
      log.error('Porch request failed', { data: { method: input.method, path: url.value.pathname }, error });
      return err(PorchErrors.UPSTREAM_FAILED(errorMessage(error)));
    }
  }
}
