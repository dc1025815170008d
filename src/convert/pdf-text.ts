/**
 * Best-effort plaintext recovery from PDF bytes.
 *
 * Scans content streams for BT/ET text objects and their Tj/TJ string
 * operands. Compressed streams, CID fonts, and encrypted files defeat this
 * scan, in which case runs of printable ASCII are returned instead. Output
 * is lossy and not layout-preserving.
 */

/** Text object: BT ... ET */
const TEXT_OBJECT_PATTERN = /BT\s+([\s\S]*?)\s+ET/g;
/** (string) Tj */
const SHOW_STRING_PATTERN = /\(([^)\\]*(?:\\.[^)\\]*)*)\)\s*Tj/g;
/** [ (a) -120 (b) ] TJ */
const SHOW_ARRAY_PATTERN = /\[([^\]]+)\]\s*TJ/g;
const ARRAY_STRING_PATTERN = /\(([^)\\]*(?:\\.[^)\\]*)*)\)/g;

/** Below this many characters the structural pass counts as failed. */
const MIN_STRUCTURED_LENGTH = 200;

const ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  "\\": "\\",
  "(": "(",
  ")": ")",
};

/** Decode backslash escapes in a PDF literal string. */
export function unescapePdfString(literal: string): string {
  return literal.replace(/\\([nrt\\()])/g, (_, ch: string) => ESCAPES[ch] ?? ch);
}

/** True when more than half of the characters are printable ASCII. */
export function isReadablePdfText(text: string): boolean {
  if (text.length === 0) return false;
  let printable = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 32 && code < 127) printable++;
  }
  return printable > Math.floor(text.length / 2);
}

function isKeptByte(byte: number): boolean {
  return (byte >= 32 && byte < 127) || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

/**
 * Keep runs of printable ASCII (plus newline, carriage return, and tab),
 * breaking lines where a run ends. Never emits three consecutive newlines.
 */
export function extractPrintableAscii(data: Uint8Array): string {
  const chars: string[] = [];
  let run = 0;
  for (const byte of data) {
    if (isKeptByte(byte)) {
      chars.push(String.fromCharCode(byte));
      run++;
    } else {
      if (run > 0) chars.push("\n");
      run = 0;
    }
  }
  return chars.join("").replace(/\n{3,}/g, "\n\n").trim();
}

function collectBlockStrings(block: string, parts: string[]): void {
  for (const m of block.matchAll(SHOW_STRING_PATTERN)) {
    const text = unescapePdfString(m[1] ?? "");
    if (isReadablePdfText(text)) parts.push(text);
  }
  for (const m of block.matchAll(SHOW_ARRAY_PATTERN)) {
    let text = "";
    for (const s of (m[1] ?? "").matchAll(ARRAY_STRING_PATTERN)) {
      text += unescapePdfString(s[1] ?? "");
    }
    if (isReadablePdfText(text)) parts.push(text);
  }
}

/**
 * Extract text from raw PDF bytes. Never throws; opaque or empty input
 * yields an empty or near-empty string.
 */
export function extractTextFromPdf(data: Uint8Array): string {
  const source = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("latin1");
  const parts: string[] = [];

  for (const block of source.matchAll(TEXT_OBJECT_PATTERN)) {
    collectBlockStrings(block[1] ?? "", parts);
  }

  const result = parts.join(" ");
  if (result.trim().length < MIN_STRUCTURED_LENGTH) {
    return extractPrintableAscii(data);
  }
  return result;
}
