/**
 * Query compiler — turns the typed pattern into a matcher.
 */

export interface Query {
  readonly pattern: string;
  readonly caseInsensitive: boolean;
}

export type CompiledQuery =
  | { readonly kind: "matcher"; readonly regex: RegExp }
  | { readonly kind: "invalid"; readonly error: string };

function tryCompile(pattern: string, flags: string): RegExp | SyntaxError {
  try {
    return new RegExp(pattern, flags);
  } catch (e) {
    if (e instanceof SyntaxError) return e;
    throw e;
  }
}

/**
 * Compile a query into a global RegExp, unicode-aware when possible.
 *
 * The `u` flag rejects escapes and brackets that plain patterns accept
 * (a lone `]` or `}`, `\-` outside a class). Such patterns are compiled again
 * without it, so `arr]` still searches. A pattern neither mode accepts yields
 * `{ kind: "invalid" }` instead of throwing.
 */
export function compileQuery(query: Query): CompiledQuery {
  const base = query.caseInsensitive ? "gi" : "g";
  const unicode = tryCompile(query.pattern, `${base}u`);
  if (unicode instanceof RegExp) return { kind: "matcher", regex: unicode };

  const plain = tryCompile(query.pattern, base);
  if (plain instanceof RegExp) return { kind: "matcher", regex: plain };
  return { kind: "invalid", error: unicode.message };
}
