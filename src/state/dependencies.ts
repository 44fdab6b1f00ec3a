/**
 * Static dependency discovery for computed vars.
 *
 * Scans a getter's source for the names it reads off its state parameter:
 * `s.name`, `s?.name`, `s['name']`, destructuring in the parameter list and
 * `const { a, b } = s` in the body. Branches are not evaluated, so the result
 * over-approximates; callers keep only names the state actually declares.
 *
 * When the parameter is used any other way (passed to a helper, aliased,
 * spread, a rest element) the getter depends on every known name. Reads
 * through `$state(...)` reach other states and need explicit deps.
 */

const IDENT = '[A-Za-z_$][\\w$]*';

const PARAM_PATTERNS: RegExp[] = [
  // (a, b) => ... / async (a) => ...
  /^\s*(?:async\s*)?\(([^)]*)\)\s*=>/,
  // a => ...
  new RegExp(`^\\s*(?:async\\s+)?(${IDENT})\\s*=>`),
  // function name(a) { ... } / function* (a) { ... }
  /^\s*(?:async\s+)?function\s*\*?\s*[\w$]*\s*\(([^)]*)\)/,
  // method shorthand: name(a) { ... }
  new RegExp(`^\\s*(?:async\\s+)?\\*?\\s*${IDENT}\\s*\\(([^)]*)\\)`),
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface ParameterList {
  first: string | null;
  /** Index where the body starts, after the parameter list. */
  bodyStart: number;
}

function parameterList(source: string): ParameterList | null {
  for (const pattern of PARAM_PATTERNS) {
    const match = pattern.exec(source);
    if (!match) continue;
    const bodyStart = match.index + match[0].length;
    const params = (match[1] ?? '').trim();
    if (!params) return { first: null, bodyStart };
    if (params.startsWith('{')) {
      let depth = 0;
      for (let i = 0; i < params.length; i++) {
        if (params[i] === '{') depth++;
        else if (params[i] === '}' && --depth === 0) {
          return { first: params.slice(0, i + 1), bodyStart };
        }
      }
      return { first: params, bodyStart };
    }
    const first = params.split(',')[0] ?? '';
    return { first: first.split('=')[0]?.trim() || null, bodyStart };
  }
  return null;
}

function identifiers(text: string): string[] {
  return text.match(new RegExp(IDENT, 'g')) ?? [];
}

interface Reads {
  names: string[];
  /** The parameter is used other than by a recognized read. */
  escapes: boolean;
}

function scanReads(source: string): Reads | null {
  const params = parameterList(source);
  if (params === null || params.first === null) return null;
  const param = params.first;

  if (param.startsWith('{')) {
    return { names: identifiers(param), escapes: param.includes('...') };
  }

  const p = escapeRegExp(param);
  const dotted = new RegExp(
    `(?<![\\w$.])${p}\\s*(?:\\?\\.|\\.)\\s*(${IDENT})`,
    'g'
  );
  const bracketed = new RegExp(
    `(?<![\\w$.])${p}\\s*(?:\\?\\.)?\\[\\s*(['"\`])(${IDENT})\\1\\s*\\]`,
    'g'
  );
  const destructured = new RegExp(`\\{([^{}]*)\\}\\s*=\\s*${p}(?![\\w$])`, 'g');
  const bare = new RegExp(`(?:(?<![\\w$.])|(?<=\\.\\.\\.))${p}(?![\\w$])`);

  const body = source.slice(params.bodyStart);
  const names: string[] = [];
  let escapes = false;

  for (const m of body.matchAll(dotted)) {
    if (m[1]) names.push(m[1]);
  }
  for (const m of body.matchAll(bracketed)) {
    if (m[2]) names.push(m[2]);
  }
  for (const m of body.matchAll(destructured)) {
    if (!m[1]) continue;
    if (m[1].includes('...')) escapes = true;
    names.push(...identifiers(m[1]));
  }

  const rest = body
    .replace(dotted, ' ')
    .replace(bracketed, ' ')
    .replace(destructured, ' ');
  if (bare.test(rest)) escapes = true;

  return { names, escapes };
}

/**
 * Names read off the state parameter of `source`, filtered to `known`,
 * in first-seen order. Every known name when the parameter escapes.
 */
export function discoverDependencies(
  source: string,
  known: ReadonlySet<string>
): string[] {
  const reads = scanReads(source);
  if (reads === null) return [];
  if (reads.escapes) return [...known];
  return [...new Set(reads.names)].filter((name) => known.has(name));
}

/** Whether the getter reaches other states through `$state(...)`. */
export function readsOtherStates(source: string): boolean {
  return scanReads(source)?.names.includes('$state') ?? false;
}
