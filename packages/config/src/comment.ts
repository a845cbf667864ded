/**
 * @wgpeers/config/comment - `# key = value` metadata comments
 */

import { COMMENT_PREFIX } from './constants.js';

/**
 * Split a comment line into a trimmed key and value at the first `=`.
 *
 * Exactly one leading `#` is dropped. Returns undefined for lines that do not
 * start with `#` and for plain comments without `=`. An empty value is
 * returned as `''`. Recognising the key is left to the caller.
 *
 * @example
 * parseCommentKeyValue('#  test  =  This can be tricky  '); // ['test', 'This can be tricky']
 * parseCommentKeyValue('# ignore'); // undefined
 */
export function parseCommentKeyValue(line: string): [key: string, value: string] | undefined {
  if (!line.startsWith(COMMENT_PREFIX)) return undefined;

  const rest = line.slice(COMMENT_PREFIX.length);
  const eq = rest.indexOf('=');
  if (eq === -1) return undefined;

  return [rest.slice(0, eq).trim(), rest.slice(eq + 1).trim()];
}
