import { toHex8 } from '@bin2const/shared';
import type { ConstantKind, ConstantSyntax } from '../types.ts';

function block(open: (name: string, length: number) => string, close: string): ConstantSyntax {
  return { open, perLine: 16, lineBreak: '\n', extraIndent: 0, close, upperCaseName: false };
}

export const CONSTANT_SYNTAX: Readonly<Record<ConstantKind, ConstantSyntax>> = {
  c: block((name) => `const unsigned char ${name}[] = {\n`, '\n};\n'),
  // First group shares the `{` line; `}` follows the last literal.
  'c-define': {
    open: (name, length) => `#define ${name}_SIZE ${length}\n#define ${name} {`,
    perLine: 8,
    lineBreak: '\\\n',
    extraIndent: 4,
    close: '}\n',
    upperCaseName: true,
  },
  rust: block((name, length) => `const ${name}: [u8; ${length}] = [\n`, '\n];\n'),
  python: block((name) => `${name} = bytes([\n`, '\n])\n'),
  csharp: block((name) => `public static readonly byte[] ${name} = new byte[] {\n`, '\n};\n'),
  javascript: block((name) => `const ${name} = new Uint8Array([\n`, '\n]);\n'),
  go: block((name) => `var ${name} = []byte{\n`, '\n}\n'),
  java: block((name) => `public static final byte[] ${name} = new byte[] {\n`, '\n};\n'),
};

/**
 * Shared loop behind every constant formatter.
 *
 * Literals are `0x`-prefixed lowercase pairs separated by `", "`. Once a line
 * holds `syntax.perLine` literals and more bytes follow, `syntax.lineBreak`
 * and a fresh indentation start the next line. Empty data still yields the
 * opening, one indentation block and the closing.
 */
export function renderConstant(data: Uint8Array, name: string, tabSize: number, syntax: ConstantSyntax): string {
  const indent = ' '.repeat(tabSize + syntax.extraIndent);
  const constName = syntax.upperCaseName ? name.toUpperCase() : name;

  let out = syntax.open(constName, data.length) + indent;
  for (const [i, value] of data.entries()) {
    out += `0x${toHex8(value)}`;
    const remaining = data.length - i - 1;
    if (remaining > 0) {
      out += ', ';
      if ((i + 1) % syntax.perLine === 0) out += syntax.lineBreak + indent;
    }
  }
  return out + syntax.close;
}

export function binaryToCConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.c);
}

export function binaryToCDefine(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX['c-define']);
}

export function binaryToRustConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.rust);
}

export function binaryToPythonConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.python);
}

export function binaryToCSharpConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.csharp);
}

export function binaryToJavaScriptConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.javascript);
}

export function binaryToGoConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.go);
}

export function binaryToJavaConst(data: Uint8Array, name: string, tabSize: number): string {
  return renderConstant(data, name, tabSize, CONSTANT_SYNTAX.java);
}
