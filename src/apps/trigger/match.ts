// space, \t, \n, \f, \r: anything else (NBSP included) is not a word boundary
const ASCII_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0c, 0x0d]);

function isAsciiWhitespace(code: number): boolean {
  return ASCII_WHITESPACE.has(code);
}

/**
 * True when `find` occurs in `message` as a whole word.
 *
 * Only the first raw occurrence is looked at: when it is glued to other
 * characters, later well-separated occurrences do not count.
 */
export function validMatch(find: string, message: string): boolean {
  const start = message.indexOf(find);
  if (start === -1) {
    return false;
  }
  const end = start + find.length;

  if (start > 0 && !isAsciiWhitespace(message.charCodeAt(start - 1))) {
    return false;
  }
  if (end < message.length && !isAsciiWhitespace(message.charCodeAt(end))) {
    return false;
  }
  return true;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\\/-]/g, '\\$&');
}

export type CompiledTrigger = { ok: true; regex: RegExp } | { ok: false; error: string };

/**
 * Compile a trigger into the pattern used to find it in a message.
 * Triggers over `maxLength` characters are rejected before compiling; the
 * error text is shown to the user.
 */
export function compileTrigger(trigger: string, maxLength = 1000): CompiledTrigger {
  if (trigger.length > maxLength) {
    return { ok: false, error: `trigger is too long (${trigger.length} > ${maxLength} characters)` };
  }
  try {
    return { ok: true, regex: new RegExp(`^.*(${escapeRegExp(trigger)}).*$`, 'ms') };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
