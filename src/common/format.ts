/**
 * Text formatting helpers shared by the expression and event layers.
 */

const WRAP_MAP: Record<string, string> = {
  '{': '}',
  '(': ')',
  '[': ']',
  '<': '>',
  '"': '"',
  "'": "'",
  '`': '`',
};

function closeChar(open: string, close?: string): string {
  if (close !== undefined) return close;
  const mapped = WRAP_MAP[open];
  if (mapped === undefined) {
    throw new Error(
      `Invalid wrap open: ${open}, must be one of ${Object.keys(WRAP_MAP).join(' ')}`
    );
  }
  return mapped;
}

/**
 * True when `text` starts with `open` and ends with the matching close char.
 * For brackets the opening char must also match the final close, so
 * `(a) + (b)` is not considered wrapped.
 */
export function isWrapped(text: string, open: string, close?: string): boolean {
  const end = closeChar(open, close);
  if (!text.startsWith(open) || !text.endsWith(end) || text.length < 2) {
    return false;
  }
  if (open === end) return true;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) depth++;
    else if (ch === end) {
      depth--;
      if (depth === 0 && i < text.length - 1) return false;
    }
  }
  return depth === 0;
}

export function wrap(
  text: string,
  open: string,
  options: { close?: string; checkFirst?: boolean; num?: number } = {}
): string {
  const { checkFirst = true, num = 1 } = options;
  const close = closeChar(open, options.close);
  if (checkFirst && isWrapped(text, open, close)) return text;
  return `${open.repeat(num)}${text}${close.repeat(num)}`;
}

/**
 * Format a raw string as a JS template literal inside braces: {`text`}
 */
export function formatString(text: string): string {
  const escaped = text.replace(/\\`/g, '`').replace(/`/g, '\\`');
  return wrap(wrap(escaped, '`'), '{');
}

const BINARY_OPERATOR_RE = /^(?:[-+*/%<>=!&|?:,]|\*\*|&&|\|\||[<>=!]=|===|!==|instanceof|in)$/;

/**
 * True when `expr` contains an operator outside of any bracket or string
 * literal, i.e. it must be parenthesized before becoming the right operand
 * of a tighter-binding operator.
 */
export function hasTopLevelOperator(expr: string): boolean {
  let depth = 0;
  let quote: string | null = null;
  let token = '';
  const tokens: string[] = [];

  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i];
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      continue;
    }
    if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
      continue;
    }
    if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      continue;
    }
    if (depth !== 0) continue;
    if (ch === ' ') {
      if (token) tokens.push(token);
      token = '';
    } else {
      token += ch;
    }
  }
  if (token) tokens.push(token);

  // A lone leading sign (e.g. `-2`) is not a binary operator.
  return tokens.slice(1).some((t) => BINARY_OPERATOR_RE.test(t));
}

/**
 * JSON encoding used for literal expressions. Returns null when the value
 * has no JSON representation.
 */
export function jsonDumps(value: unknown): string | null {
  try {
    const out = JSON.stringify(value);
    return typeof out === 'string' ? out : null;
  } catch {
    return null;
  }
}
