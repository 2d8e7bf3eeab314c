// =============================================================================
// Types
// =============================================================================

/**
 * Interior of a brace block, exclusive of the braces themselves
 */
export interface RecordSpan {
  start: number;
  end: number;
}

export type ScanResult =
  | { found: true; span: RecordSpan }
  | { found: false; reason: "no-block" }
  | { found: false; reason: "unbalanced"; offset: number };

export type LocateResult =
  | { found: true; key: string; keyOffset: number; span: RecordSpan }
  | { found: false; reason: "missing-key"; key: string }
  | { found: false; reason: "not-a-record"; key: string; keyOffset: number }
  | { found: false; reason: "unbalanced"; key: string; offset: number };

export interface Field {
  name: string;
  /** Decoded value, or null when the field is absent */
  rawValue: string | null;
  /** Value exactly as it appears between the quotes */
  escapedValue: string | null;
  /** Offsets of the value characters (inside the quotes) */
  span: RecordSpan | null;
}

export interface FieldLayout {
  /**
   * Indentation written in front of an inserted field
   */
  indent: string;
  /**
   * Whitespace between an inserted key and its value
   */
  separator: string;
  /**
   * Field names after whose line a new field is inserted.
   * The last name in this list that is present wins.
   */
  anchors: readonly string[];
}

export const DEFAULT_LAYOUT: FieldLayout = {
  indent: "\t\t\t\t\t\t",
  separator: "\t\t",
  anchors: ["name", "LastUpdated", "SizeOnDisk", "tool"]
};

export interface FieldPatch {
  text: string;
  inserted: boolean;
}

// =============================================================================
// Escape Codec
// =============================================================================

/**
 * Escape a raw string for use between double quotes.
 * Backslashes go first so the backslash added in front of a quote is not doubled.
 */
export function encode(raw: string): string {
  return raw.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Reverse of encode(). A backslash followed by any character yields that character.
 */
export function decode(escaped: string): string {
  let result = "";
  for (let i = 0; i < escaped.length; i++) {
    const ch = escaped[i];
    if (ch === "\\" && i + 1 < escaped.length) {
      result += escaped[i + 1];
      i++;
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * The quoted token for a key as it appears in a document
 */
export function quote(key: string): string {
  return `"${encode(key)}"`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// =============================================================================
// Brace Scanner
// =============================================================================

/**
 * Find the first brace block at or after `afterOffset` by counting braces.
 * Braces inside quoted values are counted like any other brace.
 */
export function findRecordBlock(
  document: string,
  afterOffset: number
): ScanResult {
  const open = document.indexOf("{", afterOffset);
  if (open === -1) {
    return { found: false, reason: "no-block" };
  }

  let depth = 0;
  for (let i = open; i < document.length; i++) {
    const ch = document[i];
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return { found: true, span: { start: open + 1, end: i } };
      }
    }
  }

  return { found: false, reason: "unbalanced", offset: open };
}

// =============================================================================
// Section Locator
// =============================================================================

function isWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Locate the record that follows the first occurrence of a quoted key.
 * Only the first occurrence is considered: if it is not followed by a block,
 * the record is reported missing even when a later occurrence would match.
 */
export function locateRecord(
  document: string,
  recordKey: string,
  fromOffset = 0
): LocateResult {
  const token = quote(recordKey);
  const keyOffset = document.indexOf(token, fromOffset);
  if (keyOffset === -1) {
    return { found: false, reason: "missing-key", key: recordKey };
  }

  let pos = keyOffset + token.length;
  while (pos < document.length && isWhitespace(document[pos])) {
    pos++;
  }
  if (document[pos] !== "{") {
    return { found: false, reason: "not-a-record", key: recordKey, keyOffset };
  }

  const scan = findRecordBlock(document, pos);
  if (!scan.found) {
    if (scan.reason === "unbalanced") {
      return {
        found: false,
        reason: "unbalanced",
        key: recordKey,
        offset: scan.offset
      };
    }
    return { found: false, reason: "not-a-record", key: recordKey, keyOffset };
  }

  return { found: true, key: recordKey, keyOffset, span: scan.span };
}

/**
 * Walk a path of keys, each searched after the previous one, and locate the
 * record named by the last key
 */
export function locateRecordPath(
  document: string,
  recordPath: readonly string[]
): LocateResult {
  const last = recordPath[recordPath.length - 1];
  if (last === undefined) {
    throw new RangeError("recordPath must contain at least one key");
  }

  let cursor = 0;
  for (const key of recordPath.slice(0, -1)) {
    const token = quote(key);
    const offset = document.indexOf(token, cursor);
    if (offset === -1) {
      return { found: false, reason: "missing-key", key };
    }
    cursor = offset + token.length;
  }

  return locateRecord(document, last, cursor);
}

// =============================================================================
// Field Patcher
// =============================================================================

// A key starts its line, or directly follows a brace. A value token with the
// same text sits after its own key on the line and never matches.
const KEY_POSITION = "(?<=(?:^|[\\n{}])[ \\t]*)";

function keyPattern(name: string): RegExp {
  return new RegExp(`${KEY_POSITION}${escapeRegExp(quote(name))}`);
}

function fieldPattern(fieldName: string): RegExp {
  return new RegExp(
    `${KEY_POSITION}${escapeRegExp(quote(fieldName))}(\\s+)"((?:[^"\\\\]|\\\\.)*)"`
  );
}

/**
 * Find the first `"name" "value"` pair in a record's text whose name is in
 * key position
 */
export function findField(recordText: string, fieldName: string): Field {
  const match = fieldPattern(fieldName).exec(recordText);
  if (!match) {
    return { name: fieldName, rawValue: null, escapedValue: null, span: null };
  }

  const [, gap, escapedValue] = match;
  // key token, separating whitespace, opening quote
  const start = match.index + quote(fieldName).length + gap.length + 1;
  const end = start + escapedValue.length;

  return {
    name: fieldName,
    rawValue: decode(escapedValue),
    escapedValue,
    span: { start, end }
  };
}

/**
 * Offset inside the record text where a new field line goes
 */
function insertionOffset(recordText: string, anchors: readonly string[]): number {
  let position: number | null = null;

  for (const anchor of anchors) {
    const match = keyPattern(anchor).exec(recordText);
    if (!match) continue;
    const lineEnd = recordText.indexOf("\n", match.index);
    position = lineEnd === -1 ? recordText.length : lineEnd + 1;
  }

  if (position !== null) return position;

  // Before the closing brace's own indentation when it sits on its own line
  const lastNewline = recordText.lastIndexOf("\n");
  if (lastNewline !== -1 && recordText.slice(lastNewline + 1).trim() === "") {
    return lastNewline + 1;
  }
  return recordText.length;
}

/**
 * Replace the value of a field, or insert the field when it is absent.
 * Only the value characters change on replace; key token and spacing are kept.
 */
export function patchField(
  recordText: string,
  fieldName: string,
  rawValue: string,
  layout: FieldLayout = DEFAULT_LAYOUT
): FieldPatch {
  const escaped = encode(rawValue);
  const field = findField(recordText, fieldName);

  if (field.span) {
    return {
      text:
        recordText.slice(0, field.span.start) +
        escaped +
        recordText.slice(field.span.end),
      inserted: false
    };
  }

  const position = insertionOffset(recordText, layout.anchors);
  const line = `${layout.indent}${quote(fieldName)}${layout.separator}"${escaped}"`;
  const atLineStart = position > 0 && recordText[position - 1] === "\n";
  const addition = atLineStart ? `${line}\n` : `\n${line}`;

  return {
    text: recordText.slice(0, position) + addition + recordText.slice(position),
    inserted: true
  };
}
