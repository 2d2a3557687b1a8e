/**
 * Line-level model of a `.env` file.
 * Parsing keeps every line, so serializing an unmodified list gives back the
 * original bytes (comments, blank lines, CRLF endings and unknown keys included).
 */

import { InvalidConfigValueError } from "../../core/domain/errors.js";
import type { ConfigDefault } from "../../core/domain/entities/config.entity.js";

export interface EnvLine {
  text: string;
  /** Line ended with "\r\n" in the source. */
  cr: boolean;
  /** Set for `KEY=VALUE` lines only. */
  key?: string;
}

function entryKey(text: string): string | undefined {
  const trimmed = text.trimStart();
  if (!trimmed || trimmed.startsWith("#")) return undefined;
  const body = trimmed.startsWith("export ") ? trimmed.slice(7) : trimmed;
  const eq = body.indexOf("=");
  if (eq <= 0) return undefined;
  return body.slice(0, eq).trim();
}

export function parseEnvLines(content: string): EnvLine[] {
  return content.split("\n").map((line) => {
    const cr = line.endsWith("\r");
    const text = cr ? line.slice(0, -1) : line;
    return { text, cr, key: entryKey(text) };
  });
}

export function serializeEnvLines(lines: EnvLine[]): string {
  return lines.map((l) => (l.cr ? `${l.text}\r` : l.text)).join("\n");
}

/**
 * Quotes the value when dotenv would otherwise read it back differently
 * (inline `#`, quotes, surrounding whitespace).
 */
export function formatValue(key: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new InvalidConfigValueError(key, "must be a single line");
  }
  const needsQuotes = value !== value.trim() || /[#"'`]/.test(value);
  if (!needsQuotes) return value;
  // Single quotes are taken literally by dotenv; double quotes expand \n and \r.
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"') && !/\\[nr]/.test(value)) return `"${value}"`;
  if (!value.includes("`")) return `\`${value}\``;
  throw new InvalidConfigValueError(key, "cannot contain every quote character at once");
}

export function formatEntry(key: string, value: string): string {
  return `${key}=${formatValue(key, value)}`;
}

/** End of a quoted value starting at `text[0]`, past the closing quote. */
function quotedEnd(text: string): number {
  const quote = text[0];
  for (let i = 1; i < text.length; i++) {
    if (text[i] === "\\") i++;
    else if (text[i] === quote) return i + 1;
  }
  return text.length;
}

/**
 * Splits an entry line around its value: `head` runs through the `=` and
 * any blanks after it, `tail` keeps an inline comment.
 */
function splitEntry(text: string): { head: string; tail: string } {
  const eq = text.indexOf("=");
  const afterEq = text.slice(eq + 1);
  const rest = afterEq.trimStart();
  const head = text.slice(0, text.length - rest.length);
  if (/^["'`]/.test(rest)) return { head, tail: rest.slice(quotedEnd(rest)) };
  const hash = rest.indexOf("#");
  if (hash === -1) return { head, tail: "" };
  const tail = rest.slice(rest.slice(0, hash).trimEnd().length);
  return { head, tail: tail.startsWith("#") ? ` ${tail}` : tail };
}

/**
 * Replaces the value of the first `key` entry in place, keeping an
 * `export` prefix, indentation and an inline comment. Returns false when
 * the key is absent.
 */
export function replaceEntry(lines: EnvLine[], key: string, value: string): boolean {
  const index = lines.findIndex((l) => l.key === key);
  if (index === -1) return false;
  const line = lines[index];
  const { head, tail } = splitEntry(line.text);
  lines[index] = { ...line, text: `${head}${formatValue(key, value)}${tail}` };
  return true;
}

export function renderDefaults(defaults: ConfigDefault[]): string {
  const out: string[] = [];
  for (const d of defaults) {
    if (d.comment) out.push(`# ${d.comment}`);
    out.push(formatEntry(d.key, d.value));
  }
  return out.join("\n") + "\n";
}
