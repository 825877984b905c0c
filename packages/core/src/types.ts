export type DumpKind = 'hex-dump' | 'binary-dump';

export type ConstantKind =
  | 'c'
  | 'c-define'
  | 'rust'
  | 'python'
  | 'csharp'
  | 'javascript'
  | 'go'
  | 'java';

export type OutputKind = DumpKind | ConstantKind;

/**
 * Decoration for one target language. Every constant formatter runs the same
 * loop and only differs in these pieces.
 */
export interface ConstantSyntax {
  /** Everything up to and including the newline that precedes the first literal line. */
  open: (name: string, length: number) => string;
  /** Literals per physical line. */
  perLine: number;
  /** Emitted between two lines of literals, before the indentation. */
  lineBreak: string;
  /** Spaces added to the caller's indentation width. */
  extraIndent: number;
  close: string;
  upperCaseName: boolean;
}

export interface FormatInfo {
  kind: OutputKind;
  description: string;
  aliases: string[];
}

export interface ConvertRequest {
  bytes: Uint8Array;
  name: string;
  format: string;
  tabSize: number;
  aliases?: Readonly<Record<string, OutputKind>>;
}

export interface ConvertResult {
  kind: OutputKind;
  text: string;
}

export interface ConvertFileRequest {
  input: string;
  name: string;
  format: string;
  tabSize: number;
  output?: string;
  aliases?: Readonly<Record<string, OutputKind>>;
}

export interface ConvertFileResult extends ConvertResult {
  bytesRead: number;
  written?: string;
}
