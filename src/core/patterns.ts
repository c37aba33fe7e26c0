/**
 * Trigger patterns and channel globs
 *
 * Ticket references are found with global regexes; the first capture group
 * is the ticket id. Channel bindings use fnmatch-style globs (`#tor*`,
 * `#debian-*`), compared case-insensitively like IRC channel names.
 */

import type { TicketRef } from './types';

/** `#1234` on its own, used in channels bound with `default: true` */
export const DEFAULT_TICKET_PATTERN = '(?<!\\w)#([0-9]{4,})(?:(?=\\W)|$)';

const INLINE_FLAGS = /^\(\?([ims]+)\)/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a trigger pattern into a global RegExp.
 * A leading inline flag group such as `(?i)` is lifted into the flags.
 */
export function compilePattern(source: string, flags = ''): RegExp {
  let body = source;
  let allFlags = flags;

  const inline = INLINE_FLAGS.exec(body);
  if (inline) {
    allFlags += inline[1];
    body = body.slice(inline[0].length);
  }

  const unique = Array.from(new Set(`${allFlags}g`.split(''))).join('');
  return new RegExp(body, unique);
}

/** The pattern a provider gets when it has a prefix but no explicit pattern: `<prefix>#NN` */
export function prefixPattern(prefix: string): RegExp {
  return compilePattern(`(?<!\\w)${escapeRegExp(prefix)}#([0-9]{2,})(?:(?=\\W)|$)`, 'i');
}

/**
 * Every reference in `text`, in order of appearance.
 * The id is capture group 1, or the whole match when the pattern has no groups.
 */
export function findTicketRefs(pattern: RegExp, text: string): TicketRef[] {
  const regex = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  const refs: TicketRef[] = [];

  for (const match of text.matchAll(regex)) {
    const id = match.length > 1 ? match[1] : match[0];
    if (id === undefined || id === '') continue;

    const groups: Record<string, string> = {};
    for (const [key, value] of Object.entries(match.groups ?? {})) {
      if (value !== undefined) groups[key] = value;
    }
    refs.push({ id, groups });
  }

  return refs;
}

/** Translate an fnmatch-style glob into an anchored, case-insensitive RegExp */
export function channelGlob(glob: string): RegExp {
  let out = '';
  let i = 0;

  while (i < glob.length) {
    const c = glob[i++];
    if (c === '*') {
      out += '.*';
    } else if (c === '?') {
      out += '.';
    } else if (c === '[') {
      let j = i;
      if (j < glob.length && glob[j] === '!') j++;
      if (j < glob.length && glob[j] === ']') j++;
      while (j < glob.length && glob[j] !== ']') j++;

      if (j >= glob.length) {
        out += '\\[';
      } else {
        let set = glob.slice(i, j).replace(/\\/g, '\\\\');
        i = j + 1;
        if (set.startsWith('!')) set = `^${set.slice(1)}`;
        else if (set.startsWith('^')) set = `\\${set}`;
        out += `[${set}]`;
      }
    } else {
      out += escapeRegExp(c);
    }
  }

  return new RegExp(`^${out}$`, 'i');
}

const globCache = new Map<string, RegExp>();

export function matchesChannel(glob: string, channel: string): boolean {
  let regex = globCache.get(glob);
  if (!regex) {
    regex = channelGlob(glob);
    globCache.set(glob, regex);
  }
  return regex.test(channel);
}
