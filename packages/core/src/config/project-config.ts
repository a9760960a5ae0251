import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError, createLogger, errorMessage } from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import { isArch } from '../registers.ts';
import { DEFAULT_MAX_THREAD_IDS } from '../rsp/command.ts';
import type { Arch, StubOptions } from '../types.ts';

export interface ProjectConfig {
  server?: { host?: string; port?: number };
  target?: { arch?: Arch; image?: string };
  protocol?: {
    maxThreadIds?: number;
    retry?: { maxAttempts?: number | null; ackTimeoutMs?: number | null };
  };
}

export const CONFIG_FILENAME = 'rsp-stub.json';

export const DEFAULT_STUB_OPTIONS: StubOptions = {
  host: '127.0.0.1',
  port: 1234,
  arch: 'x64',
  maxThreadIds: DEFAULT_MAX_THREAD_IDS,
  retry: { maxAttempts: null, ackTimeoutMs: null },
};

export function loadProjectConfig(projectDir: string, logger: Logger = createLogger()): ProjectConfig {
  const filePath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${filePath}: ${errorMessage(err)}`);
  }

  return validateConfig(raw, filePath, logger);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(obj: Record<string, unknown>, key: string, filePath: string): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${filePath}: "${key}" must be an object`);
  }
  return value;
}

function positiveInteger(value: unknown, field: string, filePath: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${filePath}: "${field}" must be a positive integer`);
  }
  return value;
}

function positiveIntegerOrNull(value: unknown, field: string, filePath: string): number | null {
  return value === null ? null : positiveInteger(value, field, filePath);
}

export function validateConfig(raw: unknown, filePath: string, logger: Logger = createLogger()): ProjectConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${filePath}: config must be a JSON object`);
  }

  const obj = raw;
  const config: ProjectConfig = {};

  const knownKeys = new Set(['server', 'target', 'protocol']);
  for (const key of Object.keys(obj)) {
    if (!knownKeys.has(key)) {
      logger.warn(`Warning: unknown key "${key}" in ${filePath}`);
    }
  }

  const server = section(obj, 'server', filePath);
  if (server) {
    config.server = {};
    if (server['host'] !== undefined) {
      if (typeof server['host'] !== 'string' || server['host'].trim().length === 0) {
        throw new ConfigError(`${filePath}: "server.host" must be a non-empty string`);
      }
      config.server.host = server['host'];
    }
    if (server['port'] !== undefined) {
      const port = server['port'];
      if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 0xffff) {
        throw new ConfigError(`${filePath}: "server.port" must be an integer between 0 and 65535`);
      }
      config.server.port = port;
    }
  }

  const target = section(obj, 'target', filePath);
  if (target) {
    config.target = {};
    if (target['arch'] !== undefined) {
      if (!isArch(target['arch'])) {
        throw new ConfigError(`${filePath}: "target.arch" must be "x86" or "x64", got "${String(target['arch'])}"`);
      }
      config.target.arch = target['arch'];
    }
    if (target['image'] !== undefined) {
      if (typeof target['image'] !== 'string') throw new ConfigError(`${filePath}: "target.image" must be a string`);
      config.target.image = target['image'];
    }
  }

  const protocol = section(obj, 'protocol', filePath);
  if (protocol) {
    const protocolKeys = new Set(['maxThreadIds', 'retry']);
    for (const key of Object.keys(protocol)) {
      if (!protocolKeys.has(key)) {
        logger.warn(`Warning: unknown key "protocol.${key}" in ${filePath}`);
      }
    }
    config.protocol = {};
    if (protocol['maxThreadIds'] !== undefined) {
      config.protocol.maxThreadIds = positiveInteger(protocol['maxThreadIds'], 'protocol.maxThreadIds', filePath);
    }
    const retry = section(protocol, 'retry', filePath);
    if (retry) {
      config.protocol.retry = {};
      if (retry['maxAttempts'] !== undefined) {
        config.protocol.retry.maxAttempts = positiveIntegerOrNull(retry['maxAttempts'], 'protocol.retry.maxAttempts', filePath);
      }
      if (retry['ackTimeoutMs'] !== undefined) {
        config.protocol.retry.ackTimeoutMs = positiveIntegerOrNull(retry['ackTimeoutMs'], 'protocol.retry.ackTimeoutMs', filePath);
      }
    }
  }

  return config;
}

export function writeProjectConfig(projectDir: string, config: ProjectConfig): void {
  const filePath = join(projectDir, CONFIG_FILENAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
}

/** Flag values beat the config file, which beats the defaults. */
export function resolveStubOptions(
  config: ProjectConfig,
  overrides: Partial<Pick<StubOptions, 'host' | 'port' | 'arch'>> = {},
): StubOptions {
  const retry = config.protocol?.retry;
  return {
    host: overrides.host ?? config.server?.host ?? DEFAULT_STUB_OPTIONS.host,
    port: overrides.port ?? config.server?.port ?? DEFAULT_STUB_OPTIONS.port,
    arch: overrides.arch ?? config.target?.arch ?? DEFAULT_STUB_OPTIONS.arch,
    maxThreadIds: config.protocol?.maxThreadIds ?? DEFAULT_STUB_OPTIONS.maxThreadIds,
    retry: {
      maxAttempts: retry?.maxAttempts ?? DEFAULT_STUB_OPTIONS.retry.maxAttempts,
      ackTimeoutMs: retry?.ackTimeoutMs ?? DEFAULT_STUB_OPTIONS.retry.ackTimeoutMs,
    },
  };
}
