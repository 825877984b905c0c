export { binaryToHex, binaryToBinary } from './dump.ts';
export {
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
} from './constants.ts';
