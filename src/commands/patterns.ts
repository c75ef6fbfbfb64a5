/**
 * Pattern compilation for regexp commands and free patterns
 */

export class PatternSyntaxError extends Error {
  public readonly source: string;

  constructor(source: string, reason: string) {
    super(`Invalid regular expression "${source}": ${reason}`);
    this.name = 'PatternSyntaxError';
    this.source = source;
  }
}

// Leading inline flag group such as (?i) or (?is)
const INLINE_FLAGS = /^\(\?([ims]+)\)/;

// Stateful flags would make test() depend on the previous call
const STATEFUL_FLAG = /[gy]/;
const STATEFUL_FLAGS = /[gy]/g;

function mergeFlags(flags: string, extra: string): string {
  const merged = new Set([...flags.replace(STATEFUL_FLAGS, ''), ...extra]);
  return [...merged].join('');
}

/**
 * Compiles a pattern given as a RegExp or source string.
 * Leading inline flag groups are turned into RegExp flags and the
 * g and y flags are dropped.
 * @throws PatternSyntaxError if the source does not compile
 */
export function compilePattern(source: RegExp | string): RegExp {
  if (source instanceof RegExp) {
    return STATEFUL_FLAG.test(source.flags)
      ? new RegExp(source.source, mergeFlags(source.flags, ''))
      : source;
  }

  if (typeof source !== 'string') {
    throw new PatternSyntaxError(String(source), 'expected a RegExp or a string');
  }

  let body = source;
  let flags = '';
  let inline = INLINE_FLAGS.exec(body);
  while (inline) {
    flags = mergeFlags(flags, inline[1]);
    body = body.slice(inline[0].length);
    inline = INLINE_FLAGS.exec(body);
  }

  try {
    return new RegExp(body, flags);
  } catch (error) {
    throw new PatternSyntaxError(source, error instanceof Error ? error.message : String(error));
  }
}
