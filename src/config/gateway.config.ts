import { LogLevel } from '@nestjs/common';

export const GATEWAY_CONFIG = Symbol('GATEWAY_CONFIG');

export const DEFAULT_PORT = 3040;

export type MessageMergePolicy = 'merge' | 'passthrough';

export interface GatewayConfig {
  port: number;
  proxyUrl?: string;
  authorization?: string;
  upstream: {
    baseUrl: string;
    model: string;
    connectTimeoutMs: number;
  };
  mergePolicy: MessageMergePolicy;
  proofOfWork: {
    maxIterations: number;
  };
  shutdownGraceMs: number;
  bodyLimit: string;
  /** Which of the documented variables were actually supplied. */
  provided: {
    port: boolean;
    proxy: boolean;
    authorization: boolean;
  };
}

const LOG_LEVEL_ORDER: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error'];

const PROXY_PROTOCOLS = ['http:', 'https:', 'socks:', 'socks4:', 'socks4a:', 'socks5:', 'socks5h:'];

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid environment variable $${name}`);
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  const port = parsePositiveInt('PORT', raw, DEFAULT_PORT);
  if (port > 65535) {
    throw new Error('Invalid environment variable $PORT');
  }
  return port;
}

function parseProxy(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new Error(`Invalid environment variable $ALL_PROXY, ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!PROXY_PROTOCOLS.includes(url.protocol)) {
    throw new Error(`Invalid environment variable $ALL_PROXY, unsupported protocol ${url.protocol}`);
  }
  return raw;
}

function parseMergePolicy(raw: string | undefined): MessageMergePolicy {
  if (!raw) return 'merge';
  if (raw === 'merge' || raw === 'passthrough') return raw;
  throw new Error('Invalid environment variable $MESSAGE_MERGE_POLICY, expected "merge" or "passthrough"');
}

/** Maps LOG_LEVEL to the set of enabled Nest logger levels, threshold style. */
export function parseLogLevels(raw: string | undefined): LogLevel[] {
  const threshold = (raw || 'log').toLowerCase();
  const idx = LOG_LEVEL_ORDER.findIndex((level) => level === threshold);
  if (idx === -1) {
    throw new Error(`Invalid environment variable $LOG_LEVEL, expected one of ${LOG_LEVEL_ORDER.join(', ')}`);
  }
  return LOG_LEVEL_ORDER.slice(idx);
}

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const authorization = env.AUTHORIZATION ? env.AUTHORIZATION : undefined;

  return {
    port: parsePort(env.PORT),
    proxyUrl: parseProxy(env.ALL_PROXY),
    authorization,
    upstream: {
      baseUrl: (env.UPSTREAM_BASE_URL || 'https://chat.openai.com').replace(/\/+$/, ''),
      model: env.UPSTREAM_MODEL || 'text-davinci-002-render-sha',
      connectTimeoutMs: parsePositiveInt('CONNECT_TIMEOUT_MS', env.CONNECT_TIMEOUT_MS, 10000),
    },
    mergePolicy: parseMergePolicy(env.MESSAGE_MERGE_POLICY),
    proofOfWork: {
      maxIterations: parsePositiveInt('POW_MAX_ITERATIONS', env.POW_MAX_ITERATIONS, 100000),
    },
    shutdownGraceMs: parsePositiveInt('SHUTDOWN_GRACE_MS', env.SHUTDOWN_GRACE_MS, 10000),
    bodyLimit: env.BODY_LIMIT || '50mb',
    provided: {
      port: Boolean(env.PORT),
      proxy: Boolean(env.ALL_PROXY),
      authorization: authorization !== undefined,
    },
  };
}
