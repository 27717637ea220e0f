/**
 * Decoder for the text inside a declaration's `[ ... ]` block.
 *
 * @module dot/attributes
 */

/** The attributes the UDF classifier reads. */
export const UDF_ATTRIBUTE_KEYS: ReadonlySet<string> = new Set([
  "label",
  "NAME",
  "FULL_NAME",
  "FILENAME",
  "AST_PARENT_FULL_NAME",
  "IS_EXTERNAL",
]);

export interface DecodeOptions {
  /** Keep only these keys. Other pairs are still tokenized, then dropped. */
  only?: ReadonlySet<string>;
}

export interface DecodedAttributes {
  attributes: Map<string, string>;
  /** Fragments that could not be read as `key=value`, in source order. */
  skipped: string[];
}

function isSeparator(ch: string): boolean {
  return ch === "," || /\s/.test(ch);
}

function isKeyStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isKeyPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function skipSpaces(text: string, pos: number): number {
  let i = pos;
  while (i < text.length && /\s/.test(text[i])) {
    i++;
  }
  return i;
}

function unescapeChar(ch: string): string {
  switch (ch) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    default:
      return ch;
  }
}

interface QuotedValue {
  value: string;
  next: number;
  terminated: boolean;
}

function readQuotedValue(text: string, pos: number): QuotedValue {
  let value = "";
  let i = pos + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      if (i + 1 < text.length) {
        value += unescapeChar(text[i + 1]);
      }
      i += 2;
    } else if (ch === '"') {
      return { value, next: i + 1, terminated: true };
    } else {
      value += ch;
      i++;
    }
  }
  return { value, next: text.length, terminated: false };
}

function skipFragment(text: string, pos: number): number {
  if (text[pos] === '"') {
    return readQuotedValue(text, pos).next;
  }
  let i = pos;
  while (i < text.length && !isSeparator(text[i])) {
    i++;
  }
  return Math.max(i, pos + 1);
}

/**
 * Decodes `key=value` pairs separated by whitespace and/or commas.
 *
 * A repeated key keeps its last value. Anything that is not a pair is
 * reported in `skipped` and decoding carries on after it.
 */
export function decodeAttributes(
  text: string,
  options: DecodeOptions = {},
): DecodedAttributes {
  const attributes = new Map<string, string>();
  const skipped: string[] = [];
  let i = 0;

  while (i < text.length) {
    while (i < text.length && isSeparator(text[i])) {
      i++;
    }
    if (i >= text.length) break;

    if (!isKeyStart(text[i])) {
      const next = skipFragment(text, i);
      skipped.push(text.slice(i, next));
      i = next;
      continue;
    }

    const keyStart = i;
    while (i < text.length && isKeyPart(text[i])) {
      i++;
    }
    const key = text.slice(keyStart, i);

    const afterKey = skipSpaces(text, i);
    if (text[afterKey] !== "=") {
      skipped.push(key);
      continue;
    }
    i = skipSpaces(text, afterKey + 1);

    let value: string;
    if (text[i] === '"') {
      const quoted = readQuotedValue(text, i);
      if (!quoted.terminated) {
        skipped.push(text.slice(keyStart));
        break;
      }
      value = quoted.value;
      i = quoted.next;
    } else {
      const valueStart = i;
      while (i < text.length && !isSeparator(text[i]) && text[i] !== "]") {
        i++;
      }
      value = text.slice(valueStart, i);
    }

    if (!options.only || options.only.has(key)) {
      attributes.set(key, value);
    }
  }

  return { attributes, skipped };
}
