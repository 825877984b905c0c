// Types
export type {
  DumpKind,
  ConstantKind,
  OutputKind,
  ConstantSyntax,
  FormatInfo,
  ConvertRequest,
  ConvertResult,
  ConvertFileRequest,
  ConvertFileResult,
} from './types.ts';

// Errors
export { ConversionError, errorMessage } from './errors.ts';
export type { ConversionErrorCode } from './errors.ts';

// Formatters
export {
  binaryToHex,
  binaryToBinary,
  CONSTANT_SYNTAX,
  renderConstant,
  binaryToCConst,
  binaryToCDefine,
  binaryToRustConst,
  binaryToPythonConst,
  binaryToCSharpConst,
  binaryToJavaScriptConst,
  binaryToGoConst,
  binaryToJavaConst,
} from './formatters/index.ts';

// Dispatch
export {
  OUTPUT_KINDS,
  FORMAT_ALIASES,
  normalizeSelector,
  isOutputKind,
  createFormatTable,
  resolveFormat,
  renderOutput,
  listFormats,
} from './formats.ts';

// Conversion pipeline
export { DEFAULT_TAB_SIZE, MAX_TAB_SIZE, parseTabSize, readInput, convert, convertFile } from './convert.ts';

// Config
export type { ProjectConfig } from './config/index.ts';
export {
  CONFIG_FILENAME,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './config/index.ts';
