import {isUtf8} from 'node:buffer';

const PERCENT = 0x25;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/u;

/**
 * Decodes `%XX` escapes into raw bytes. A `%` not followed by two hex digits
 * is kept as a literal byte.
 */
export const percentDecode = (raw: string): Buffer => {
  const input = Buffer.from(raw, 'utf8');
  const output = Buffer.alloc(input.length);
  let length = 0;

  for (let index = 0; index < input.length; index += 1) {
    const byte = input[index];
    if (byte === PERCENT && index + 2 < input.length) {
      const hex = input.subarray(index + 1, index + 3).toString('latin1');
      if (HEX_PAIR.test(hex)) {
        output[length] = Number.parseInt(hex, 16);
        length += 1;
        index += 2;
        continue;
      }
    }

    output[length] = byte;
    length += 1;
  }

  return output.subarray(0, length);
};

/** Percent-decoded text of a capture, or undefined when the bytes are not UTF-8. A BOM is kept. */
export const decodeCapture = (raw: string): string | undefined => {
  const bytes = percentDecode(raw);
  return isUtf8(bytes) ? bytes.toString('utf8') : undefined;
};
