import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  FilewireConfig,
  FilewireConfigOverrides,
  LogLevel,
  TlsConfig,
} from '../../shared/types/config';
import {
  ensureBoolean,
  ensureChunkSize,
  ensureString,
  isPlainObject,
} from '../utils/validation';

export const DEFAULT_CHUNK_SIZE = 4096;

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['error', 'warn', 'info', 'debug']);

export function defaultConfig(secure: boolean): FilewireConfig {
  return {
    chunkSize: DEFAULT_CHUNK_SIZE,
    receiveDir: secure ? 'received_tls' : 'received',
    metricsFile: secure ? 'metrics_tls.csv' : 'metrics_plain.csv',
    logLevel: 'info',
    tls: {
      certFile: path.join('certs', 'cert.pem'),
      keyFile: path.join('certs', 'key.pem'),
      trustAnchorFile: path.join('certs', 'cert.pem'),
      verifyHostname: false,
    },
  };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function ensureLogLevel(value: unknown, field: string): LogLevel {
  const level = ensureString(value, field, { enum: LOG_LEVELS });
  if (!isLogLevel(level)) {
    throw new Error(`Field "${field}" must be one of: ${Array.from(LOG_LEVELS).join(', ')}`);
  }
  return level;
}

/** Validates an untrusted object (parsed JSON) into overrides. Unknown keys are rejected. */
export function parseOverrides(input: unknown, source = 'config'): FilewireConfigOverrides {
  if (!isPlainObject(input)) {
    throw new Error(`${source} must be a JSON object.`);
  }

  const overrides: FilewireConfigOverrides = {};
  for (const [key, value] of Object.entries(input)) {
    const field = `${source}.${key}`;
    switch (key) {
      case 'chunkSize':
        overrides.chunkSize = ensureChunkSize(value, field);
        break;
      case 'receiveDir':
        overrides.receiveDir = ensureString(value, field);
        break;
      case 'metricsFile':
        overrides.metricsFile = ensureString(value, field);
        break;
      case 'logLevel':
        overrides.logLevel = ensureLogLevel(value, field);
        break;
      case 'logDir':
        overrides.logDir = ensureString(value, field);
        break;
      case 'tls':
        overrides.tls = parseTlsOverrides(value, field);
        break;
      default:
        throw new Error(`Unknown configuration field "${field}".`);
    }
  }
  return overrides;
}

function parseTlsOverrides(input: unknown, source: string): Partial<TlsConfig> {
  if (!isPlainObject(input)) {
    throw new Error(`Field "${source}" must be an object.`);
  }

  const tls: Partial<TlsConfig> = {};
  for (const [key, value] of Object.entries(input)) {
    const field = `${source}.${key}`;
    switch (key) {
      case 'certFile':
      case 'keyFile':
      case 'trustAnchorFile':
        tls[key] = ensureString(value, field);
        break;
      case 'verifyHostname':
        tls.verifyHostname = ensureBoolean(value, field);
        break;
      default:
        throw new Error(`Unknown configuration field "${field}".`);
    }
  }
  return tls;
}

export async function loadConfigFile(filePath: string): Promise<FilewireConfigOverrides> {
  const resolved = path.resolve(filePath);
  const contents = await fs.readFile(resolved, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new Error(`Configuration file ${resolved} is not valid JSON: ${String(error)}`);
  }
  return parseOverrides(parsed, path.basename(resolved));
}

export function envOverrides(env: NodeJS.ProcessEnv = process.env): FilewireConfigOverrides {
  const overrides: FilewireConfigOverrides = {};
  if (env.FILEWIRE_LOG_LEVEL) {
    overrides.logLevel = ensureLogLevel(env.FILEWIRE_LOG_LEVEL, 'FILEWIRE_LOG_LEVEL');
  }
  if (env.FILEWIRE_LOG_DIR) {
    overrides.logDir = ensureString(env.FILEWIRE_LOG_DIR, 'FILEWIRE_LOG_DIR');
  }
  return overrides;
}

/** Layers are applied in order; later layers win. The result is frozen. */
export function resolveConfig(
  secure: boolean,
  ...layers: FilewireConfigOverrides[]
): Readonly<FilewireConfig> {
  const base = defaultConfig(secure);
  const merged = layers.reduce<FilewireConfig>(
    (config, layer) => ({
      chunkSize: layer.chunkSize ?? config.chunkSize,
      receiveDir: layer.receiveDir ?? config.receiveDir,
      metricsFile: layer.metricsFile ?? config.metricsFile,
      logLevel: layer.logLevel ?? config.logLevel,
      logDir: layer.logDir ?? config.logDir,
      tls: {
        certFile: layer.tls?.certFile ?? config.tls.certFile,
        keyFile: layer.tls?.keyFile ?? config.tls.keyFile,
        trustAnchorFile: layer.tls?.trustAnchorFile ?? config.tls.trustAnchorFile,
        verifyHostname: layer.tls?.verifyHostname ?? config.tls.verifyHostname,
      },
    }),
    base
  );

  ensureChunkSize(merged.chunkSize);
  return Object.freeze({ ...merged, tls: Object.freeze({ ...merged.tls }) });
}
