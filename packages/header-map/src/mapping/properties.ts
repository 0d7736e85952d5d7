/**
 * Properties-file codec for mapping resources.
 *
 * Reads the usual conventions (`#`/`!` comments, `\` continuations, `=`, `:` or
 * whitespace separators, `\uXXXX` escapes) and writes plain `key=value` lines.
 */

import { PropertiesSyntaxError } from "../model/errors.js";

export type PropertyPair = readonly [key: string, value: string];

const WHITESPACE = new Set([" ", "\t", "\f"]);

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && WHITESPACE.has(text.charAt(i))) i++;
  return i;
}

function endsWithContinuation(line: string): boolean {
  let slashes = 0;
  for (let i = line.length - 1; i >= 0 && line.charAt(i) === "\\"; i--) slashes++;
  return slashes % 2 === 1;
}

function unescape(raw: string, line: number): string {
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    i++;
    if (i >= raw.length) break;
    const next = raw.charAt(i);
    switch (next) {
      case "t": out += "\t"; break;
      case "n": out += "\n"; break;
      case "r": out += "\r"; break;
      case "f": out += "\f"; break;
      case "u": {
        const hex = raw.slice(i + 1, i + 5);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw new PropertiesSyntaxError("Malformed \\uxxxx encoding", line);
        }
        out += String.fromCharCode(parseInt(hex, 16));
        i += 4;
        break;
      }
      default:
        out += next;
    }
  }
  return out;
}

function parseLogicalLine(text: string, line: number): PropertyPair {
  let keyEnd = 0;
  while (keyEnd < text.length) {
    const ch = text.charAt(keyEnd);
    if (ch === "\\") {
      keyEnd += 2;
      continue;
    }
    if (ch === "=" || ch === ":" || WHITESPACE.has(ch)) break;
    keyEnd++;
  }
  const rawKey = text.slice(0, keyEnd);
  let valueStart = skipWhitespace(text, keyEnd);
  const sep = text.charAt(valueStart);
  if (sep === "=" || sep === ":") {
    valueStart = skipWhitespace(text, valueStart + 1);
  }
  return [unescape(rawKey, line), unescape(text.slice(valueStart), line)];
}

/** Parse properties text into ordered pairs. Duplicate keys are kept in order. */
export function parseProperties(text: string): PropertyPair[] {
  const lines = text.split(/\r\n|\r|\n/);
  const pairs: PropertyPair[] = [];

  for (let i = 0; i < lines.length; i++) {
    const startLine = i + 1;
    let logical = (lines[i] ?? "").slice(skipWhitespace(lines[i] ?? "", 0));
    if (logical === "" || logical.startsWith("#") || logical.startsWith("!")) {
      continue;
    }
    while (endsWithContinuation(logical)) {
      logical = logical.slice(0, -1);
      if (i + 1 >= lines.length) break;
      i++;
      const next = lines[i] ?? "";
      logical += next.slice(skipWhitespace(next, 0));
    }
    pairs.push(parseLogicalLine(logical, startLine));
  }

  return pairs;
}

function escape(text: string, isKey: boolean): string {
  let out = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case "\t": out += "\\t"; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\f": out += "\\f"; break;
      case " ":
        out += isKey || i === 0 ? "\\ " : " ";
        break;
      case "=":
      case ":":
      case "#":
      case "!":
        out += isKey ? `\\${ch}` : ch;
        break;
      default: {
        const code = ch.charCodeAt(0);
        out += code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : ch;
      }
    }
  }
  return out;
}

/** One `key=value` line per pair, in the given order, each newline-terminated. */
export function serializeProperties(pairs: Iterable<PropertyPair>): string {
  let out = "";
  for (const [key, value] of pairs) {
    out += `${escape(key, true)}=${escape(value, false)}\n`;
  }
  return out;
}
