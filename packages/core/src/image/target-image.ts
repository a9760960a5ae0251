import { readFileSync } from 'node:fs';
import { ConfigError, errorMessage, fromHex } from '@rsp-stub/shared';
import { isArch, layoutFor } from '../registers.ts';
import type { Arch } from '../types.ts';

export interface MemoryRegion {
  address: bigint;
  data: Buffer;
}

/** A frozen target: what a debugger sees when it attaches to a stopped program. */
export interface TargetImage {
  arch: Arch;
  registers: Record<string, bigint>;
  memory: MemoryRegion[];
  stopSignal: number;
  /** Threads that may be resumed; empty accepts any id. */
  threads: number[];
}

export const DEFAULT_STOP_SIGNAL = 5;

function parseHexValue(value: unknown, field: string, source: string): bigint {
  if (typeof value !== 'string' || !/^(0x)?[0-9a-fA-F]+$/.test(value)) {
    throw new ConfigError(`${source}: "${field}" must be a hex string`);
  }
  return BigInt(value.startsWith('0x') ? value : `0x${value}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `fallbackArch` applies when the image does not name its own. */
export function parseTargetImage(raw: unknown, source: string, fallbackArch: Arch = 'x64'): TargetImage {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: target image must be a JSON object`);
  }

  const arch = raw['arch'] ?? fallbackArch;
  if (!isArch(arch)) {
    throw new ConfigError(`${source}: "arch" must be "x86" or "x64"`);
  }

  if (!isRecord(raw['registers'])) {
    throw new ConfigError(`${source}: "registers" must be an object`);
  }
  const registers: Record<string, bigint> = {};
  const known = new Set(layoutFor(arch).names);
  for (const [name, value] of Object.entries(raw['registers'])) {
    if (!known.has(name)) {
      throw new ConfigError(`${source}: unknown ${arch} register "${name}"`);
    }
    registers[name] = parseHexValue(value, `registers.${name}`, source);
  }

  const memoryRaw = raw['memory'] ?? [];
  if (!Array.isArray(memoryRaw)) {
    throw new ConfigError(`${source}: "memory" must be an array`);
  }
  const memory = memoryRaw.map((entry: unknown, i): MemoryRegion => {
    if (!isRecord(entry)) {
      throw new ConfigError(`${source}: "memory[${i}]" must be an object`);
    }
    const address = parseHexValue(entry['address'], `memory[${i}].address`, source);
    if (typeof entry['data'] !== 'string') {
      throw new ConfigError(`${source}: "memory[${i}].data" must be a hex string`);
    }
    let data: Buffer;
    try {
      data = fromHex(entry['data']);
    } catch (err) {
      throw new ConfigError(`${source}: "memory[${i}].data": ${errorMessage(err)}`);
    }
    return { address, data };
  });

  const stopSignal = raw['stopSignal'] ?? DEFAULT_STOP_SIGNAL;
  if (typeof stopSignal !== 'number' || !Number.isInteger(stopSignal) || stopSignal < 0 || stopSignal > 0xff) {
    throw new ConfigError(`${source}: "stopSignal" must be an integer between 0 and 255`);
  }

  const threadsRaw = raw['threads'] ?? [];
  if (!Array.isArray(threadsRaw)) {
    throw new ConfigError(`${source}: "threads" must be an array`);
  }
  const threads: number[] = [];
  for (const id of threadsRaw) {
    if (typeof id !== 'number' || !Number.isInteger(id) || id < 0 || id > 0xffffffff) {
      throw new ConfigError(`${source}: "threads" entries must be 32-bit thread ids`);
    }
    threads.push(id);
  }

  return { arch, registers, memory, stopSignal, threads };
}

export function loadTargetImage(filePath: string, fallbackArch?: Arch): TargetImage {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read target image ${filePath}: ${errorMessage(err)}`);
  }
  return parseTargetImage(raw, filePath, fallbackArch);
}
