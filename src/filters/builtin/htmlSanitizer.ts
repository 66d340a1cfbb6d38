import type { JsonValue } from "../../json/value.js";
import type { FilterConfigSnapshot } from "../config.js";
import { mapPayloadStrings } from "../payload.js";
import type { Filter } from "../types.js";

export type HtmlSanitizerOptions = FilterConfigSnapshot["htmlSanitizer"];

/** Elements removed together with everything up to their closing tag. */
const ALWAYS_REMOVED = ["script", "style", "iframe", "object", "embed"];
const TRACKING_TAGS = ["img"];
const AD_TAGS = ["ins", "aside"];

/** Elements that never have content; their start tag is all there is to drop. */
const VOID_TAGS = new Set(["area", "base", "br", "col", "embed", "hr", "img", "input", "link", "meta", "source", "track", "wbr"]);

const URL_ATTRIBUTES = new Set(["href", "src", "action", "formaction"]);
const DANGEROUS_SCHEMES = ["javascript:", "data:", "vbscript:"];

const WHITESPACE_RUN = /\s+/g;

const CHARACTER_REFERENCE = /&(#[xX][0-9a-fA-F]+|#[0-9]+|[A-Za-z][A-Za-z0-9]*);?/g;

/** Named references that can spell out a URL scheme or the characters around it. */
const NAMED_REFERENCES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  colon: ":",
  Tab: "\t",
  NewLine: "\n",
  nbsp: "\u00a0",
  sol: "/",
  bsol: "\\",
  lpar: "(",
  rpar: ")",
  period: ".",
  comma: ",",
  semi: ";",
  equals: "=",
  quest: "?",
  excl: "!",
  num: "#",
  percnt: "%",
  plus: "+",
  commat: "@",
};

interface ParsedAttribute {
  name: string;
  value: string | null;
}

interface ParsedTag {
  name: string;
  attributes: ParsedAttribute[];
  selfClosing: boolean;
  /** Index right after the closing `>`. */
  end: number;
}

function isAsciiLetter(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

function isTagNameChar(code: number): boolean {
  return isAsciiLetter(code) || (code >= 0x30 && code <= 0x39) || code === 0x2d;
}

function isSpace(code: number): boolean {
  return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0c || code === 0x0d;
}

/** Reads a tag name starting at {@link start}; returns the index after it. */
function readTagName(input: string, start: number): number {
  let index = start;
  while (index < input.length && isTagNameChar(input.charCodeAt(index))) {
    index += 1;
  }
  return index;
}

/**
 * Parses the attributes of a start tag whose name ends at {@link start}.
 * Returns `null` when the input ends before the closing `>`.
 */
function readStartTag(input: string, name: string, start: number): ParsedTag | null {
  const attributes: ParsedAttribute[] = [];
  let index = start;
  for (;;) {
    while (index < input.length && isSpace(input.charCodeAt(index))) {
      index += 1;
    }
    if (index >= input.length) {
      return null;
    }
    const char = input[index];
    if (char === ">") {
      return { name, attributes, selfClosing: false, end: index + 1 };
    }
    if (char === "/") {
      if (input[index + 1] === ">") {
        return { name, attributes, selfClosing: true, end: index + 2 };
      }
      index += 1;
      continue;
    }

    const nameStart = index;
    while (index < input.length) {
      const code = input.charCodeAt(index);
      if (isSpace(code) || input[index] === "=" || input[index] === ">" || input[index] === "/") {
        break;
      }
      index += 1;
    }
    const attributeName = input.slice(nameStart, index).toLowerCase();
    while (index < input.length && isSpace(input.charCodeAt(index))) {
      index += 1;
    }

    let value: string | null = null;
    if (input[index] === "=") {
      index += 1;
      while (index < input.length && isSpace(input.charCodeAt(index))) {
        index += 1;
      }
      const quote = input[index];
      if (quote === '"' || quote === "'") {
        const close = input.indexOf(quote, index + 1);
        if (close < 0) {
          return null;
        }
        value = input.slice(index + 1, close);
        index = close + 1;
      } else {
        const valueStart = index;
        while (index < input.length && !isSpace(input.charCodeAt(index)) && input[index] !== ">") {
          index += 1;
        }
        value = input.slice(valueStart, index);
      }
    }
    if (attributeName.length > 0) {
      attributes.push({ name: attributeName, value });
    }
  }
}

/** True when the URL uses a script-capable scheme, ignoring case, whitespace and control characters. */
export function isDangerousUrl(value: string): boolean {
  let compact = "";
  for (const char of value) {
    if (char.charCodeAt(0) > 0x20) {
      compact += char.toLowerCase();
    }
    if (compact.length > 16) {
      break;
    }
  }
  return DANGEROUS_SCHEMES.some((scheme) => compact.startsWith(scheme));
}

function fromCodePoint(codePoint: number): string {
  if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return "\ufffd";
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Resolves numeric references and the named ones a browser would turn into URL
 * punctuation. Unknown names stay literal.
 */
export function decodeCharacterReferences(value: string): string {
  if (!value.includes("&")) {
    return value;
  }
  return value.replace(CHARACTER_REFERENCE, (match: string, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith("#")) {
      return fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    if (!match.endsWith(";") && body !== "amp" && body !== "lt" && body !== "gt" && body !== "quot") {
      return match;
    }
    return Object.hasOwn(NAMED_REFERENCES, body) ? NAMED_REFERENCES[body] : match;
  });
}

/** Escapes a decoded attribute value for a double-quoted attribute. */
function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

function renderStartTag(tag: ParsedTag): string {
  const parts: string[] = [tag.name];
  for (const attribute of tag.attributes) {
    if (attribute.name.startsWith("on") || attribute.name === "style") {
      continue;
    }
    const value = decodeCharacterReferences(attribute.value ?? "");
    if (URL_ATTRIBUTES.has(attribute.name) && isDangerousUrl(value)) {
      continue;
    }
    parts.push(`${attribute.name}="${escapeAttribute(value)}"`);
  }
  return `<${parts.join(" ")}${tag.selfClosing ? " /" : ""}>`;
}

/** Index right after the closing tag of {@link name}, or the end of input when it is missing. */
function skipElementContent(input: string, name: string, from: number): number {
  const closing = new RegExp(`</${name}(?![A-Za-z0-9-])`, "gi");
  closing.lastIndex = from;
  const match = closing.exec(input);
  if (!match) {
    return input.length;
  }
  const end = input.indexOf(">", match.index);
  return end < 0 ? input.length : end + 1;
}

/**
 * Single left-to-right pass over {@link input}: text is copied as is, removed
 * elements are skipped with their content, comments and declarations are
 * dropped, and every kept tag is re-rendered from its parsed attributes.
 */
export function sanitizeHtml(input: string, options: HtmlSanitizerOptions): string {
  let output = input;
  if (options.removeScripts && input.includes("<")) {
    const removed = new Set(ALWAYS_REMOVED);
    if (options.removeTracking) {
      TRACKING_TAGS.forEach((tag) => removed.add(tag));
    }
    if (options.removeAds) {
      AD_TAGS.forEach((tag) => removed.add(tag));
    }
    output = stripTags(input, removed);
  }
  if (options.normalizeWhitespace) {
    output = output.replace(WHITESPACE_RUN, " ").trim();
  }
  return output;
}

function stripTags(input: string, removed: ReadonlySet<string>): string {
  const chunks: string[] = [];
  let index = 0;
  while (index < input.length) {
    const lt = input.indexOf("<", index);
    if (lt < 0) {
      chunks.push(input.slice(index));
      break;
    }
    chunks.push(input.slice(index, lt));

    if (input.startsWith("<!--", lt)) {
      const close = input.indexOf("-->", lt + 4);
      index = close < 0 ? input.length : close + 3;
      continue;
    }

    const next = input.charCodeAt(lt + 1);
    if (input[lt + 1] === "!" || input[lt + 1] === "?") {
      const close = input.indexOf(">", lt);
      index = close < 0 ? input.length : close + 1;
      continue;
    }

    if (input[lt + 1] === "/") {
      const nameEnd = readTagName(input, lt + 2);
      const close = input.indexOf(">", nameEnd);
      if (nameEnd === lt + 2 || !isAsciiLetter(input.charCodeAt(lt + 2)) || close < 0) {
        chunks.push("<");
        index = lt + 1;
        continue;
      }
      const name = input.slice(lt + 2, nameEnd).toLowerCase();
      if (!removed.has(name)) {
        chunks.push(`</${name}>`);
      }
      index = close + 1;
      continue;
    }

    if (!isAsciiLetter(next)) {
      chunks.push("<");
      index = lt + 1;
      continue;
    }

    const nameEnd = readTagName(input, lt + 1);
    const name = input.slice(lt + 1, nameEnd).toLowerCase();
    const tag = readStartTag(input, name, nameEnd);
    if (!tag) {
      // Unterminated tag: nothing after it can be trusted.
      break;
    }
    if (removed.has(name)) {
      index = tag.selfClosing || VOID_TAGS.has(name) ? tag.end : skipElementContent(input, name, tag.end);
      continue;
    }
    chunks.push(renderStartTag(tag));
    index = tag.end;
  }
  return chunks.join("");
}

export const htmlSanitizerFilter: Filter = {
  name: "html_sanitizer",
  description: "Strips scripts, trackers, event handlers and dangerous URLs from HTML content",
  directions: ["server_to_client"],
  defaultEnabled: true,
  cacheable: true,
  apply(message: JsonValue, context) {
    let changed = false;
    const output = mapPayloadStrings(message, (value) => {
      const sanitized = sanitizeHtml(value, context.config.htmlSanitizer);
      if (sanitized !== value) {
        changed = true;
      }
      return sanitized;
    });
    return changed ? { action: "pass", message: output, actions: ["sanitized"] } : { action: "pass", message };
  },
};
