/**
 * Title fixups: reshape a fetched page title into the line we print
 */

import type { Fixup } from './types';

const INLINE_FLAGS = /^\(\?([ims]+)\)/;

/**
 * Match `regex` from the start of the title and keep its first group.
 * The result is always `#<id>: <title>`; a title that does not match is kept whole.
 *
 * @example
 * reGroupFixup('#[0-9]+ - (.*) - Debian Bug report logs$')('123456', '#123456 - grub: fails - Debian Bug report logs')
 * // => '#123456: grub: fails'
 */
export function reGroupFixup(regex: string): Fixup {
  let body = regex;
  let flags = '';
  const inline = INLINE_FLAGS.exec(body);
  if (inline) {
    flags = inline[1];
    body = body.slice(inline[0].length);
  }
  const anchored = new RegExp(`^(?:${body})`, flags);

  return (id, title) => {
    const match = anchored.exec(title);
    const text = match && match.length > 1 && match[1] !== undefined ? match[1] : title;
    return `#${id}: ${text}`;
  };
}

/** Substitute `{id}` and `{title}` into a template, e.g. `Prop#{id}: {title}` */
export function templateFixup(template: string): Fixup {
  return (id, title) => template.replace(/\{(id|title)\}/g, (_, key: string) => (key === 'id' ? id : title));
}
