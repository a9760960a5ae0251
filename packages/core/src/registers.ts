import type { Arch, RegisterLayout } from './types.ts';

const GENERAL_32 = ['eax', 'ebx', 'ecx', 'edx', 'esi', 'edi', 'ebp', 'esp'] as const;
const GENERAL_64 = ['rax', 'rbx', 'rcx', 'rdx', 'rsi', 'rdi', 'rbp', 'rsp'] as const;
const EXTENDED_64 = ['r8', 'r9', 'r10', 'r11', 'r12', 'r13', 'r14', 'r15'] as const;

export const REGISTER_LAYOUTS: Readonly<Record<Arch, RegisterLayout>> = {
  x86: {
    arch: 'x86',
    width: 32,
    byteOrder: 'little',
    names: [...GENERAL_32, 'eip', 'eflags'],
  },
  x64: {
    arch: 'x64',
    width: 64,
    byteOrder: 'little',
    names: [...GENERAL_64, ...EXTENDED_64, 'rip', 'eflags'],
  },
};

export const ARCHES = ['x86', 'x64'] as const satisfies readonly Arch[];

export function isArch(value: unknown): value is Arch {
  return value === 'x86' || value === 'x64';
}

export function layoutFor(arch: Arch): RegisterLayout {
  return REGISTER_LAYOUTS[arch];
}
