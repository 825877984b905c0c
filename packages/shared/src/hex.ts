export function toHex8(value: number): string {
  return (value & 0xff).toString(16).padStart(2, '0');
}

export function toHex32(value: number): string {
  return (value >>> 0).toString(16).padStart(8, '0');
}

export function toBin8(value: number): string {
  return (value & 0xff).toString(2).padStart(8, '0');
}

/** Printable ASCII is 0x20 (space) through 0x7e (tilde). */
export function isPrintableAscii(value: number): boolean {
  return value >= 0x20 && value <= 0x7e;
}

export function toAsciiChar(value: number): string {
  return isPrintableAscii(value) ? String.fromCharCode(value) : '.';
}
