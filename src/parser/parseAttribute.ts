import { METHOD_OPTION_KEYS } from '../signature/methodOptions.js';
import { ConfigurationError } from '../signature/signatureTypes.js';
import { parseTypeText } from './typeFromNode.js';

const METHOD_ATTRIBUTE = /^#\[\s*(?:[\w:]+::)?method\s*(?:\(([\s\S]*)\))?\s*\]$/;
const STRING_LITERAL = /^"((?:[^"\\]|\\.)*)"$/;
const IDENTIFIER = /^[A-Za-z_]\w*$/;

/** Splits on commas outside `<>`, `()`, `[]` and string literals. */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let inString = false;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '<' || ch === '(' || ch === '[') depth++;
    else if (ch === '>' || ch === ')' || ch === ']') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function unquote(literal: string): string | undefined {
  const m = STRING_LITERAL.exec(literal);
  return m ? (m[1] ?? '').replace(/\\(.)/g, '$1') : undefined;
}

function optionValue(key: string, text: string, where: string): unknown {
  if (key === 'state') return parseTypeText(text);
  if (text === 'true') return true;
  if (text === 'false') return false;
  const str = unquote(text);
  if (str !== undefined) return str;
  throw new ConfigurationError(`Cannot read value of \`${key}\`${where}: ${text}`);
}

/**
 * Reads `#[method]` / `#[method(...)]` attribute text into a raw option
 * record. Returns undefined for any other attribute.
 *
 * Accepted forms: `state = Type`, `name = "jsName"`, a bare `"jsName"`,
 * and the flags `promise` / `fast` (optionally `= true|false`).
 */
export function readMethodAttribute(
  attributeText: string,
  fnName?: string,
): Record<string, unknown> | undefined {
  const m = METHOD_ATTRIBUTE.exec(attributeText.trim());
  if (!m) return undefined;

  const where = fnName ? ` (fn=${fnName})` : '';
  const raw: Record<string, unknown> = {};
  for (const part of splitTopLevel(m[1] ?? '')) {
    const bareName = unquote(part);
    if (bareName !== undefined) {
      raw.name = bareName;
      continue;
    }
    const eq = part.indexOf('=');
    if (eq === -1) {
      if (!IDENTIFIER.test(part)) {
        throw new ConfigurationError(`Malformed option \`${part}\`${where}`);
      }
      raw[part] = true;
      continue;
    }
    const key = part.slice(0, eq).trim();
    if (!IDENTIFIER.test(key)) {
      throw new ConfigurationError(`Malformed option \`${part}\`${where}`);
    }
    const valueText = part.slice(eq + 1).trim();
    // Unknown keys are reported by option validation with the full hint.
    raw[key] = METHOD_OPTION_KEYS.some((k) => k === key)
      ? optionValue(key, valueText, where)
      : valueText;
  }
  return raw;
}
