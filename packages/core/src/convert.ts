import { readFileSync, writeFileSync } from 'node:fs';
import type { ConvertFileRequest, ConvertFileResult, ConvertRequest, ConvertResult } from './types.ts';
import { ConversionError, errorMessage } from './errors.ts';
import { createFormatTable, renderOutput, resolveFormat } from './formats.ts';

export const DEFAULT_TAB_SIZE = 4;
export const MAX_TAB_SIZE = 256;

/**
 * Decimal integer in `0..MAX_TAB_SIZE`, optionally with a leading `+`;
 * anything else yields `fallback`.
 */
export function parseTabSize(raw: string | number | undefined, fallback = DEFAULT_TAB_SIZE): number {
  if (raw === undefined) return fallback;
  const text = String(raw);
  if (!/^\+?\d+$/.test(text)) return fallback;
  const value = Number(text);
  return value <= MAX_TAB_SIZE ? value : fallback;
}

export function readInput(path: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(path));
  } catch (err) {
    throw new ConversionError('READ_FAILED', `Error while reading file: ${errorMessage(err)}`, { cause: err });
  }
}

export function convert(request: ConvertRequest): ConvertResult {
  const kind = resolveFormat(request.format, createFormatTable(request.aliases));
  return { kind, text: renderOutput(kind, request.bytes, request.name, request.tabSize) };
}

export function convertFile(request: ConvertFileRequest): ConvertFileResult {
  const bytes = readInput(request.input);
  const { kind, text } = convert({ ...request, bytes });

  if (request.output === undefined) {
    return { kind, text, bytesRead: bytes.length };
  }

  try {
    writeFileSync(request.output, text);
  } catch (err) {
    throw new ConversionError('WRITE_FAILED', `Error while writing to file: ${errorMessage(err)}`, { cause: err });
  }
  return { kind, text, bytesRead: bytes.length, written: request.output };
}
