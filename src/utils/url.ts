/**
 * Request-target helpers: percent-decoding and path/query splitting.
 */

const PERCENT_RUN = /(?:%[0-9a-fA-F]{2})+/g;
const ABSOLUTE_FORM = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Percent-decode a string.
 *
 * Runs of `%XX` escapes are decoded as UTF-8; byte sequences that are not
 * valid UTF-8 become U+FFFD. Malformed escapes (`%zz`, a lone `%`) are left
 * as written. `+` is not treated as a space.
 */
export function percentDecode(value: string): string {
  if (!value.includes('%')) return value;
  return value.replace(PERCENT_RUN, (run) => {
    const bytes = Buffer.alloc(run.length / 3);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
    }
    return bytes.toString('utf8');
  });
}

export interface SplitTarget {
  path: string;
  query: string;
}

/**
 * Split a request target into path and query.
 *
 * The fragment is dropped. For an absolute-form target the scheme and
 * authority are removed. When no path remains the whole raw target is
 * used as the path.
 */
export function splitRequestTarget(target: string): SplitTarget {
  const hashAt = target.indexOf('#');
  const withoutFragment = hashAt === -1 ? target : target.slice(0, hashAt);

  const queryAt = withoutFragment.indexOf('?');
  let head = queryAt === -1 ? withoutFragment : withoutFragment.slice(0, queryAt);
  const query = queryAt === -1 ? '' : withoutFragment.slice(queryAt + 1);

  const scheme = ABSOLUTE_FORM.exec(head);
  if (scheme) {
    head = head.slice(scheme[0].length - 2);
  }
  if (head.startsWith('//')) {
    const slashAt = head.indexOf('/', 2);
    head = slashAt === -1 ? '' : head.slice(slashAt);
  }

  return { path: head || target, query };
}
