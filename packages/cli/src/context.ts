import { isArch, loadProjectConfig } from '@rsp-stub/core';
import type { Arch, ProjectConfig } from '@rsp-stub/core';
import { ConfigError, createLogger } from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';

export interface CommandContext {
  projectDir: string;
  config: ProjectConfig;
  logger: Logger;
}

export function optionalString(argv: Record<string, unknown>, key: string): string | undefined {
  const value = argv[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumber(argv: Record<string, unknown>, key: string): number | undefined {
  const value = argv[key];
  return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
}

export function optionalArch(argv: Record<string, unknown>, key = 'arch'): Arch | undefined {
  const value = argv[key];
  if (value === undefined) return undefined;
  if (!isArch(value)) throw new ConfigError(`--${key} must be "x86" or "x64"`);
  return value;
}

export function resolveContext(argv: Record<string, unknown>): CommandContext {
  const projectDir = optionalString(argv, 'project') ?? process.cwd();
  const logger = createLogger({ verbose: argv['verbose'] === true });
  return { projectDir, config: loadProjectConfig(projectDir, logger), logger };
}

/** `0x`-prefixed hex, or decimal. */
export function parseNumber(input: string): bigint {
  const text = input.trim();
  if (/^0[xX][0-9a-fA-F]+$/.test(text) || /^[0-9]+$/.test(text)) {
    return BigInt(text);
  }
  throw new ConfigError(`Not a number: "${input}"`);
}
