import type { FormatInfo, OutputKind } from './types.ts';
import { ConversionError } from './errors.ts';
import {
  binaryToHex,
  binaryToBinary,
  binaryToCConst,
  binaryToCDefine,
  binaryToRustConst,
  binaryToPythonConst,
  binaryToCSharpConst,
  binaryToJavaScriptConst,
  binaryToGoConst,
  binaryToJavaConst,
} from './formatters/index.ts';

const FORMATS: readonly FormatInfo[] = [
  { kind: 'binary-dump', description: 'Binary memory dump', aliases: ['bin', 'binary', 'raw'] },
  { kind: 'hex-dump', description: 'Hex memory dump', aliases: ['hex', 'hexadecimal', 'hexa', 'hexa-decimal', 'hexa_decimal'] },
  { kind: 'c', description: 'C/C++ unsigned char array', aliases: ['c', 'cpp', 'c++', 'cxx', 'h', 'hpp', 'h++', 'hxx'] },
  { kind: 'c-define', description: 'C/C++ #define with a _SIZE macro', aliases: ['cdef', 'c-def', 'c_def', 'def', 'define', 'cppdef'] },
  { kind: 'rust', description: 'Rust [u8; N] constant', aliases: ['rust', 'rs', 'rustlang', 'rust-lang'] },
  { kind: 'csharp', description: 'C# static readonly byte[]', aliases: ['csharp', 'cs', 'c#', 'c-sharp', 'c_sharp'] },
  { kind: 'python', description: 'Python bytes object', aliases: ['python', 'py', 'python3', 'py3', 'python_3'] },
  { kind: 'javascript', description: 'JavaScript/TypeScript Uint8Array', aliases: ['javascript', 'js', 'typescript', 'ts'] },
  { kind: 'go', description: 'Go []byte variable', aliases: ['go', 'golang'] },
  { kind: 'java', description: 'Java static final byte[]', aliases: ['java'] },
];

export const OUTPUT_KINDS: readonly OutputKind[] = FORMATS.map((f) => f.kind);

export const FORMAT_ALIASES: ReadonlyMap<string, OutputKind> = new Map(
  FORMATS.flatMap((f) => f.aliases.map((alias): [string, OutputKind] => [alias, f.kind])),
);

export function normalizeSelector(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isOutputKind(value: unknown): value is OutputKind {
  return OUTPUT_KINDS.some((kind) => kind === value);
}

/**
 * Built-in aliases plus project-level ones. Extra keys are normalized;
 * a key that collides with a built-in alias keeps its built-in meaning.
 */
export function createFormatTable(
  extraAliases: Readonly<Record<string, OutputKind>> = {},
): ReadonlyMap<string, OutputKind> {
  const table = new Map(FORMAT_ALIASES);
  for (const [alias, kind] of Object.entries(extraAliases)) {
    const key = normalizeSelector(alias);
    if (!table.has(key)) table.set(key, kind);
  }
  return table;
}

export function resolveFormat(
  raw: string,
  table: ReadonlyMap<string, OutputKind> = FORMAT_ALIASES,
): OutputKind {
  const kind = table.get(normalizeSelector(raw));
  if (kind === undefined) {
    throw new ConversionError('UNKNOWN_FORMAT', `Unknown conversion type: ${raw}`);
  }
  return kind;
}

export function renderOutput(kind: OutputKind, data: Uint8Array, name: string, tabSize: number): string {
  switch (kind) {
    case 'hex-dump':
      return binaryToHex(data);
    case 'binary-dump':
      return binaryToBinary(data);
    case 'c':
      return binaryToCConst(data, name, tabSize);
    case 'c-define':
      return binaryToCDefine(data, name, tabSize);
    case 'rust':
      return binaryToRustConst(data, name, tabSize);
    case 'python':
      return binaryToPythonConst(data, name, tabSize);
    case 'csharp':
      return binaryToCSharpConst(data, name, tabSize);
    case 'javascript':
      return binaryToJavaScriptConst(data, name, tabSize);
    case 'go':
      return binaryToGoConst(data, name, tabSize);
    case 'java':
      return binaryToJavaConst(data, name, tabSize);
  }
}

export function listFormats(): FormatInfo[] {
  return FORMATS.map((f) => ({ ...f, aliases: [...f.aliases] }));
}
