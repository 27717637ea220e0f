/**
 * Declaration scanner for the DOT-like CPG export format.
 *
 * The scanner is line-oriented only where declarations start: a declaration
 * begins on a line whose first non-whitespace character is `"`. Edges live on
 * a single physical line. Node attribute blocks may span many lines because
 * quoted values can hold real newlines, so the block body is walked by a small
 * state machine that tracks quotes and backslash escapes across line breaks.
 *
 * Nothing here throws on bad input. Fragments the scanner cannot make sense of
 * are reported as diagnostics and scanning resumes on the next line.
 *
 * @module dot/scanner
 */

import type { DeclarationKind } from "./types.js";

/** `outside` is the state between declarations, where only line starts matter. */
export type ScanState =
  | "outside"
  | "inNodeBlock"
  | "inQuotedString"
  | "inQuotedStringEscape";

export interface Declaration {
  kind: DeclarationKind;
  /** 1-based line of the opening quote. */
  line: number;
  sourceId: string;
  /** Set for edges only. */
  targetId: string | null;
  /** Text between `[` and the terminating `]`, trailing whitespace trimmed. */
  attributeText: string;
  rawText: string;
}

export interface ScanDiagnostic {
  line: number;
  message: string;
}

export interface ScanResult {
  graphName: string | null;
  declarations: Declaration[];
  diagnostics: ScanDiagnostic[];
}

export type BlockScan =
  | { ok: true; closeBracket: number; semicolon: number; newlines: number }
  | { ok: false; state: ScanState };

const DIGRAPH_HEADER =
  /^\s*(?:strict\s+)?digraph\s+(?:"((?:[^"\\]|\\.)*)"|([^\s{]+))\s*\{/;

function isWhitespace(ch: string): boolean {
  return (
    ch === " " ||
    ch === "\t" ||
    ch === "\n" ||
    ch === "\r" ||
    ch === "\f" ||
    ch === "\v" ||
    ch === "\uFEFF"
  );
}

function skipInlineWhitespace(text: string, pos: number, end: number): number {
  let i = pos;
  while (i < end && text[i] !== "\n" && isWhitespace(text[i])) {
    i++;
  }
  return i;
}

function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * Walks an attribute block starting just after its `[`.
 *
 * The block ends at the first `]` outside a quoted string that is followed,
 * after optional whitespace, by `;`. A `"` following a backslash is part of
 * the string, and because the escape state consumes exactly one character,
 * an even run of backslashes leaves the next quote unescaped.
 */
export function scanAttributeBlock(
  text: string,
  from: number,
  limit: number = text.length,
): BlockScan {
  let state: ScanState = "inNodeBlock";
  let newlines = 0;

  for (let i = from; i < limit; i++) {
    const ch = text[i];
    if (ch === "\n") {
      newlines++;
    }

    switch (state) {
      case "inNodeBlock":
        if (ch === '"') {
          state = "inQuotedString";
        } else if (ch === "]") {
          let k = i + 1;
          let trailingNewlines = 0;
          while (k < limit && isWhitespace(text[k])) {
            if (text[k] === "\n") trailingNewlines++;
            k++;
          }
          if (k < limit && text[k] === ";") {
            return {
              ok: true,
              closeBracket: i,
              semicolon: k,
              newlines: newlines + trailingNewlines,
            };
          }
        }
        break;
      case "inQuotedString":
        if (ch === "\\") {
          state = "inQuotedStringEscape";
        } else if (ch === '"') {
          state = "inNodeBlock";
        }
        break;
      case "inQuotedStringEscape":
        state = "inQuotedString";
        break;
    }
  }

  return { ok: false, state };
}

type QuotedId = { value: string; next: number } | null;

function readQuotedId(text: string, pos: number, end: number): QuotedId {
  let i = pos + 1;
  while (i < end) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
    } else if (ch === '"') {
      return { value: text.slice(pos + 1, i), next: i + 1 };
    } else {
      i++;
    }
  }
  return null;
}

type Header =
  | {
      ok: true;
      kind: DeclarationKind;
      sourceId: string;
      targetId: string | null;
      openBracket: number;
    }
  | { ok: false; message: string };

function readHeader(text: string, pos: number, end: number): Header {
  const source = readQuotedId(text, pos, end);
  if (!source) {
    return { ok: false, message: "unterminated quoted id" };
  }
  if (source.value.length === 0) {
    return { ok: false, message: "empty node id" };
  }

  let i = skipInlineWhitespace(text, source.next, end);
  let targetId: string | null = null;

  if (text.startsWith("->", i)) {
    i = skipInlineWhitespace(text, i + 2, end);
    if (text[i] !== '"') {
      return {
        ok: false,
        message: `edge from "${source.value}" has no quoted target id`,
      };
    }
    const target = readQuotedId(text, i, end);
    if (!target) {
      return { ok: false, message: "unterminated quoted target id" };
    }
    if (target.value.length === 0) {
      return { ok: false, message: "empty target id" };
    }
    targetId = target.value;
    i = skipInlineWhitespace(text, target.next, end);
  }

  if (i >= end || text[i] !== "[") {
    return {
      ok: false,
      message: `expected "[" after "${targetId ?? source.value}"`,
    };
  }

  return {
    ok: true,
    kind: targetId === null ? "node" : "edge",
    sourceId: source.value,
    targetId,
    openBracket: i,
  };
}

function matchGraphName(line: string): string | null {
  const match = DIGRAPH_HEADER.exec(line);
  if (!match) {
    return null;
  }
  return match[1] ?? match[2] ?? null;
}

/**
 * Splits the text of one graph into its node and edge declarations, in
 * source order.
 */
export function scanDeclarations(text: string): ScanResult {
  const lineStarts = computeLineStarts(text);
  const declarations: Declaration[] = [];
  const diagnostics: ScanDiagnostic[] = [];
  let graphName: string | null = null;
  let sawDeclaration = false;

  let lineIndex = 0;
  while (lineIndex < lineStarts.length) {
    const start = lineStarts[lineIndex];
    const nextStart = lineStarts[lineIndex + 1];
    const end = nextStart === undefined ? text.length : nextStart - 1;
    const first = skipInlineWhitespace(text, start, end);

    if (first >= end || text[first] !== '"') {
      if (graphName === null && !sawDeclaration) {
        graphName = matchGraphName(text.slice(start, end));
      }
      lineIndex++;
      continue;
    }

    const lineNumber = lineIndex + 1;
    const header = readHeader(text, first, end);
    if (!header.ok) {
      diagnostics.push({ line: lineNumber, message: header.message });
      lineIndex++;
      continue;
    }

    const limit = header.kind === "edge" ? end : text.length;
    const block = scanAttributeBlock(text, header.openBracket + 1, limit);
    if (!block.ok) {
      diagnostics.push({
        line: lineNumber,
        message: describeUnterminated(header.kind, header.sourceId, block.state),
      });
      lineIndex++;
      continue;
    }

    sawDeclaration = true;
    declarations.push({
      kind: header.kind,
      line: lineNumber,
      sourceId: header.sourceId,
      targetId: header.targetId,
      attributeText: text
        .slice(header.openBracket + 1, block.closeBracket)
        .trimEnd(),
      rawText: text.slice(first, block.semicolon + 1),
    });
    lineIndex += block.newlines + 1;
  }

  return { graphName, declarations, diagnostics };
}

function describeUnterminated(
  kind: DeclarationKind,
  id: string,
  state: ScanState,
): string {
  const inString =
    state === "inQuotedString" || state === "inQuotedStringEscape";
  if (kind === "edge") {
    return inString
      ? `edge from "${id}" has an unterminated quoted value on its line`
      : `edge from "${id}" is not terminated by "];" on its line`;
  }
  return inString
    ? `node "${id}" has an unterminated quoted value`
    : `node "${id}" is not terminated by "];" before end of input`;
}
