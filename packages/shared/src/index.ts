export { toHex8, toHex32, toBin8, isPrintableAscii, toAsciiChar } from './hex.ts';
