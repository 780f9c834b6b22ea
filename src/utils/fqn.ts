/**
 * Fully-qualified name helpers
 *
 * FQN parts are joined with `.`; a part that itself contains `.` is wrapped
 * in double quotes, e.g. `Glossary."Term.With.Dots".Child`.
 */

import { InvalidArgumentError } from '../errors.js';

const SEPARATOR = '.';
const QUOTE = '"';

function unquote(part: string): string {
  if (part.length >= 2 && part.startsWith(QUOTE) && part.endsWith(QUOTE)) {
    return part.slice(1, -1);
  }
  return part;
}

export function quoteName(name: string): string {
  return name.includes(SEPARATOR) ? `${QUOTE}${name}${QUOTE}` : name;
}

/**
 * Split an FQN into its unquoted parts
 */
export function split(fqn: string): string[] {
  if (fqn === '') {
    return [];
  }

  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of fqn) {
    if (ch === QUOTE) {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === SEPARATOR && !inQuotes) {
      parts.push(unquote(current));
      current = '';
    } else {
      current += ch;
    }
  }

  if (inQuotes) {
    throw new InvalidArgumentError(`Invalid fully qualified name ${fqn}: unbalanced quotes`);
  }

  parts.push(unquote(current));
  return parts;
}

/**
 * Join parts into an FQN, quoting any part that contains the separator
 */
export function build(...parts: string[]): string {
  return parts.map(quoteName).join(SEPARATOR);
}

/**
 * FQN of the parent: every part but the last. Empty for a single part.
 */
export function getParentFqn(parts: readonly string[]): string {
  return build(...parts.slice(0, -1));
}
