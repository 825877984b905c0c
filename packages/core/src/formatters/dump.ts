import { toHex8, toHex32, toBin8, toAsciiChar } from '@bin2const/shared';

const BYTES_PER_ROW = 16;
const BYTES_PER_GROUP = 4;

function renderDump(data: Uint8Array, renderByte: (value: number) => string, slotWidth: number): string {
  const blank = ' '.repeat(slotWidth + 1);
  let out = '';
  for (let i = 0; i < data.length; i += BYTES_PER_ROW) {
    const row = data.subarray(i, i + BYTES_PER_ROW);
    let slots = '';
    let ascii = '';
    for (let j = 0; j < BYTES_PER_ROW; j++) {
      const value = row[j];
      if (value !== undefined) {
        slots += `${renderByte(value)} `;
        ascii += toAsciiChar(value);
      } else {
        slots += blank;
        ascii += ' ';
      }
      if (j % BYTES_PER_GROUP === BYTES_PER_GROUP - 1) slots += ' ';
    }
    out += `${toHex32(i)}  ${slots} |${ascii}|\n`;
  }
  return out;
}

/**
 * Classic hex dump: offset, sixteen byte slots in groups of four, ASCII column.
 * Empty input renders as the empty string.
 */
export function binaryToHex(data: Uint8Array): string {
  return renderDump(data, toHex8, 2);
}

/** Same layout as {@link binaryToHex} with each byte as eight binary digits. */
export function binaryToBinary(data: Uint8Array): string {
  return renderDump(data, toBin8, 8);
}
