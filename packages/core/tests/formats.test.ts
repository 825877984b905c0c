import { describe, it, expect } from 'vitest';
import {
  ConversionError,
  FORMAT_ALIASES,
  binaryToCSharpConst,
  binaryToHex,
  createFormatTable,
  listFormats,
  normalizeSelector,
  renderOutput,
  resolveFormat,
} from '../src/index.ts';

describe('resolveFormat', () => {
  it.each([
    ['bin', 'binary-dump'],
    ['raw', 'binary-dump'],
    ['hexa_decimal', 'hex-dump'],
    ['h++', 'c'],
    ['cppdef', 'c-define'],
    ['rust-lang', 'rust'],
    ['c_sharp', 'csharp'],
    ['python_3', 'python'],
    ['ts', 'javascript'],
    ['golang', 'go'],
    ['java', 'java'],
  ])('maps %s to %s', (selector, kind) => {
    expect(resolveFormat(selector)).toBe(kind);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(resolveFormat('  C#\t')).toBe('csharp');
    expect(resolveFormat('PyThOn3')).toBe('python');
  });

  it('rejects an unknown selector with the raw text', () => {
    expect(() => resolveFormat('xyz')).toThrow(ConversionError);
    try {
      resolveFormat(' XYZ ');
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError);
      if (err instanceof ConversionError) {
        expect(err.code).toBe('UNKNOWN_FORMAT');
        expect(err.message).toBe('Unknown conversion type:  XYZ ');
      }
    }
  });

  it('does not treat kind identifiers as aliases', () => {
    expect(() => resolveFormat('hex-dump')).toThrow('Unknown conversion type: hex-dump');
  });
});

describe('normalizeSelector', () => {
  it('trims and lowercases', () => {
    expect(normalizeSelector('  Rust ')).toBe('rust');
  });
});

describe('createFormatTable', () => {
  it('adds normalized project aliases', () => {
    const table = createFormatTable({ ' Embed ': 'c' });
    expect(resolveFormat('EMBED', table)).toBe('c');
    expect(FORMAT_ALIASES.has('embed')).toBe(false);
  });

  it('never redefines a built-in alias', () => {
    const table = createFormatTable({ js: 'python' });
    expect(resolveFormat('js', table)).toBe('javascript');
  });
});

describe('renderOutput', () => {
  const data = Uint8Array.from({ length: 21 }, (_, i) => i * 11);

  it('dispatches to the matching formatter', () => {
    expect(renderOutput('hex-dump', data, 'ignored', 4)).toBe(binaryToHex(data));
    expect(renderOutput('csharp', data, 'Blob', 2)).toBe(binaryToCSharpConst(data, 'Blob', 2));
  });

  it('gives identical output for every alias in a group', () => {
    for (const format of listFormats()) {
      const outputs = new Set(format.aliases.map((alias) => renderOutput(resolveFormat(alias), data, 'blob', 4)));
      expect(outputs.size).toBe(1);
    }
  });
});

describe('listFormats', () => {
  it('lists every kind once, with all of its aliases', () => {
    const formats = listFormats();
    expect(formats.map((f) => f.kind)).toEqual([
      'binary-dump',
      'hex-dump',
      'c',
      'c-define',
      'rust',
      'csharp',
      'python',
      'javascript',
      'go',
      'java',
    ]);
    const aliasCount = formats.reduce((n, f) => n + f.aliases.length, 0);
    expect(aliasCount).toBe(FORMAT_ALIASES.size);
  });

  it('returns copies', () => {
    const first = listFormats();
    first[0]?.aliases.push('mutated');
    expect(listFormats()[0]?.aliases).toEqual(['bin', 'binary', 'raw']);
  });
});
