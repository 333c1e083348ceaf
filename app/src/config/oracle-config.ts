/**
 * Oracle configuration file loader
 *
 * Environment overrides are applied to the raw document before validation:
 * ORACLE_RPC_URL, ORACLE_MODE, ORACLE_STATUS_PORT, ORACLE_READ_PORT,
 * ORACLE_HERMES_URL, ORACLE_LOG_LEVEL.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, FeedKind, LogLevel } from '../types';
import {
  DEFAULT_GRACE_PERIOD_SECONDS,
  DEFAULT_MAX_DEVIATION_BPS,
  DEFAULT_MAX_PEER_DIVERGENCE_BPS,
  DEFAULT_MIN_PEER_AGREEMENT,
  DEFAULT_MIN_VALID_SOURCES,
  DEFAULT_QUOTE_SYMBOL,
  DEFAULT_READ_CHANNEL_ID,
  DEFAULT_READ_CONFIRMATIONS,
  DEFAULT_READ_PORT,
  DEFAULT_REQUEST_TTL_SECONDS,
  DEFAULT_RPC_URL,
  DEFAULT_STALENESS_SECONDS,
  DEFAULT_STATUS_PORT,
  DEFAULT_TWAP_PERIOD_SECONDS,
  MAX_POOLS,
  MAX_SOURCES,
  MAX_WEIGHT,
  PYTH_HERMES_URL,
  UPDATE_INTERVAL_MS,
} from './constants';

const port = z.coerce.number().int().min(1).max(65535);
const ref = z.string().trim().min(1);

const sourceSchema = z.object({
  kind: z.nativeEnum(FeedKind),
  endpointRef: ref,
  weight: z.number().int().min(0).max(MAX_WEIGHT),
  maxStalenessSeconds: z.number().int().positive().default(DEFAULT_STALENESS_SECONDS),
  active: z.boolean().default(true),
  extra: z.string().default(''),
});

const poolSchema = z.object({
  poolRef: ref,
  assetToken: ref,
  assetDecimals: z.number().int().min(0).max(77),
  nativeDecimals: z.number().int().min(0).max(77),
});

const peerEndpointSchema = z.object({
  chainId: z.number().int().positive(),
  oracleRef: ref,
  readUrl: z.string().url().optional(),
});

export const oracleConfigSchema = z.object({
  version: z.string().default('1'),
  chainId: z.number().int().positive(),
  mode: z.enum(['producer', 'consumer']),
  rpcUrl: z.string().url().default(DEFAULT_RPC_URL),
  quoteSymbol: z.string().trim().min(1).default(DEFAULT_QUOTE_SYMBOL),
  minValidSources: z.number().int().min(1).max(MAX_SOURCES).default(DEFAULT_MIN_VALID_SOURCES),
  updateIntervalMs: z.number().int().positive().default(UPDATE_INTERVAL_MS),
  sources: z
    .array(sourceSchema)
    .max(MAX_SOURCES)
    .refine((list) => new Set(list.map((s) => s.kind)).size === list.length, {
      message: 'At most one source per feed kind',
    })
    .default([]),
  pools: z.array(poolSchema).max(MAX_POOLS).default([]),
  twap: z
    .object({
      enabled: z.boolean().default(true),
      periodSeconds: z.number().int().positive().default(DEFAULT_TWAP_PERIOD_SECONDS),
    })
    .default({}),
  deviationGate: z
    .object({
      maxDeviationBps: z.number().int().min(0).default(DEFAULT_MAX_DEVIATION_BPS),
      gracePeriodSeconds: z.number().int().min(0).default(DEFAULT_GRACE_PERIOD_SECONDS),
    })
    .default({}),
  peers: z
    .object({
      readChannelId: z.number().int().min(0).default(DEFAULT_READ_CHANNEL_ID),
      confirmations: z.number().int().min(0).default(DEFAULT_READ_CONFIRMATIONS),
      requestTtlSeconds: z.number().int().positive().default(DEFAULT_REQUEST_TTL_SECONDS),
      minPeerAgreement: z.number().int().min(1).default(DEFAULT_MIN_PEER_AGREEMENT),
      maxPeerDivergenceBps: z.number().int().min(0).default(DEFAULT_MAX_PEER_DIVERGENCE_BPS),
      registry: z.string().trim().min(1).optional(),
      endpoints: z.array(peerEndpointSchema).default([]),
    })
    .default({}),
  hermes: z
    .object({
      enabled: z.boolean().default(false),
      url: z.string().url().default(PYTH_HERMES_URL),
    })
    .default({}),
  server: z
    .object({
      statusPort: port.default(DEFAULT_STATUS_PORT),
      readPort: port.default(DEFAULT_READ_PORT),
    })
    .default({}),
  logLevel: z.preprocess(
    (v) => (typeof v === 'string' ? v.toUpperCase() : v),
    z.nativeEnum(LogLevel).default(LogLevel.INFO)
  ),
});

export type OracleConfig = z.infer<typeof oracleConfigSchema>;

type Env = Record<string, string | undefined>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(doc: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = doc[key];
  const copy = isObject(existing) ? { ...existing } : {};
  doc[key] = copy;
  return copy;
}

/**
 * Overlay ORACLE_* environment variables onto a raw config document
 */
export function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (!isObject(raw)) {
    return raw;
  }
  const doc: Record<string, unknown> = { ...raw };

  if (env.ORACLE_RPC_URL) doc.rpcUrl = env.ORACLE_RPC_URL;
  if (env.ORACLE_MODE) doc.mode = env.ORACLE_MODE.toLowerCase();
  if (env.ORACLE_LOG_LEVEL) doc.logLevel = env.ORACLE_LOG_LEVEL;
  if (env.ORACLE_STATUS_PORT) section(doc, 'server').statusPort = env.ORACLE_STATUS_PORT;
  if (env.ORACLE_READ_PORT) section(doc, 'server').readPort = env.ORACLE_READ_PORT;
  if (env.ORACLE_HERMES_URL) {
    const hermes = section(doc, 'hermes');
    hermes.url = env.ORACLE_HERMES_URL;
    hermes.enabled = true;
  }

  return doc;
}

/**
 * Validate a raw config document
 */
export function parseOracleConfig(raw: unknown, env: Env = process.env): OracleConfig {
  const result = oracleConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid oracle config: ${issues}`);
  }
  return result.data;
}

/**
 * Read, override and validate an oracle config file
 */
export async function loadOracleConfig(configPath: string, env: Env = process.env): Promise<OracleConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config ${configPath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config ${configPath} is not valid JSON: ${message}`);
  }

  return parseOracleConfig(raw, env);
}
