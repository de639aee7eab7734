import chardet from "chardet";
import iconv from "iconv-lite";
import { logger } from "../../logger.js";

const log = logger.child({ module: "decode" });

export interface DecodedOutput {
  text: string;
  /** Encoding that was used to produce `text` */
  encoding: string;
}

/**
 * Turns a captured byte stream into text. `hint` is the encoding the caller
 * declared, if any. Implementations must not throw.
 */
export type Decoder = (bytes: Buffer, hint?: string) => DecodedOutput;

/** Longest BOM first so UTF-32LE is not mistaken for UTF-16LE. */
const BOMS: ReadonlyArray<{ bytes: readonly number[]; encoding: string }> = [
  { bytes: [0xff, 0xfe, 0x00, 0x00], encoding: "utf-32le" },
  { bytes: [0x00, 0x00, 0xfe, 0xff], encoding: "utf-32be" },
  { bytes: [0xef, 0xbb, 0xbf], encoding: "utf-8" },
  { bytes: [0xff, 0xfe], encoding: "utf-16le" },
  { bytes: [0xfe, 0xff], encoding: "utf-16be" },
];

function bomEncoding(bytes: Buffer): string | null {
  const bom = BOMS.find((b) => b.bytes.every((byte, i) => bytes[i] === byte));
  return bom ? bom.encoding : null;
}

function decodeStrictUtf8(bytes: Buffer): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Best-effort decoding of child process output:
 *   1. the declared encoding, when iconv-lite knows it
 *   2. a UTF-8/16/32 byte order mark
 *   3. strict UTF-8
 *   4. chardet's guess, when iconv-lite knows it
 *   5. lossy UTF-8
 */
export const decodeOutput: Decoder = (bytes, hint) => {
  if (bytes.length === 0) return { text: "", encoding: "utf-8" };

  if (hint && iconv.encodingExists(hint)) {
    return { text: iconv.decode(bytes, hint), encoding: hint };
  }

  const bom = bomEncoding(bytes);
  if (bom) return { text: iconv.decode(bytes, bom), encoding: bom };

  const utf8 = decodeStrictUtf8(bytes);
  if (utf8 !== null) return { text: utf8, encoding: "utf-8" };

  const guessed = chardet.detect(bytes);
  if (guessed && iconv.encodingExists(guessed)) {
    return { text: iconv.decode(bytes, guessed), encoding: guessed };
  }

  log.debug({ guessed, length: bytes.length }, "Could not detect output encoding, decoding as lossy UTF-8");
  return { text: bytes.toString("utf8"), encoding: "utf-8" };
};

/**
 * Splits decoded output into lines. A final line terminator does not yield
 * an empty trailing line.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const trimmed = text.endsWith("\r\n") ? text.slice(0, -2) : text.endsWith("\n") ? text.slice(0, -1) : text;
  return trimmed.split(/\r?\n/);
}
