/**
 * Status finders: pull a ticket's state out of a tracker page
 */

import type { CheerioAPI } from 'cheerio';

export type StatusFinder = ($: CheerioAPI) => string | undefined;

/** Trac ticket pages: `closed` plus the resolution, e.g. `closed: fixed` */
export const tracStatus: StatusFinder = $ => {
  const status = $('.trac-status').first().text().trim();
  if (!status) return undefined;

  const resolution = $('.trac-resolution').first().text().trim().replace(/^\(|\)$/g, '').trim();
  return resolution ? `${status}: ${resolution}` : status;
};

export const STATUS_FINDERS = {
  trac: tracStatus,
} satisfies Record<string, StatusFinder>;

export type StatusFinderName = keyof typeof STATUS_FINDERS;
