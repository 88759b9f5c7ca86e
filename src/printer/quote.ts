/**
 * String quoting shared by the AST printer and value repr.
 */

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/** Double-quote `value`, escaping backslash, quote and control whitespace */
export function quoteString(value: string): string {
  let result = '"';
  for (const ch of value) {
    result += ESCAPES[ch] ?? ch;
  }
  return result + '"';
}
