import * as cheerio from 'cheerio';
import { canonicalizeUrl } from '../utils/contentHash.js';

/**
 * Fields read from a listing row; missing cells are empty strings
 */
export interface ListingMetadata {
  title: string;
  year: string;
  number: string;
  documentType: string;
}

export interface ListingEntry {
  url: string;
  listing: ListingMetadata;
}

export interface ParsedListingPage {
  entries: ListingEntry[];
  hasNextPage: boolean;
}

/**
 * Page layout collaborator for search result pages
 */
export interface ListingParser {
  parse(html: string, pageUrl: string): ParsedListingPage;
}

function cellText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * legislation.gov.uk search results: one `tbody tr` per document with
 * title link, year, number and type cells.
 */
export class LegislationListingParser implements ListingParser {
  parse(html: string, pageUrl: string): ParsedListingPage {
    const $ = cheerio.load(html);
    const entries: ListingEntry[] = [];
    const seen = new Set<string>();

    $('tbody tr').each((_, row) => {
      const cells = $(row).find('td');
      const link = cells.eq(0).find('a').first();
      const href = link.attr('href');
      if (!href) {
        return;
      }

      let url: string;
      try {
        url = new URL(href, pageUrl).toString();
      } catch {
        return;
      }
      if (seen.has(url)) {
        return;
      }
      seen.add(url);

      entries.push({
        url,
        listing: {
          title: cellText(link.text()),
          year: cellText(cells.eq(1).text()),
          number: cellText(cells.eq(2).text()),
          documentType: cellText(cells.eq(3).text()),
        },
      });
    });

    const hasNextPage =
      $('a[rel="next"], .pagination a.next, li.next a').length > 0 ||
      $('a')
        .toArray()
        .some((anchor) => /^next\b/i.test(cellText($(anchor).text())) && !!$(anchor).attr('href'));

    return { entries, hasNextPage };
  }
}

export interface ContentsLink {
  url: string;
  title: string;
}

export const CONTENTS_LINK_SELECTOR = '.LegContents li a, #legContents li a';

/**
 * Section pages linked from a document's table of contents, in page order.
 * Anchors back into the page itself and repeated targets are dropped.
 */
export function parseContentsLinks(html: string, pageUrl: string): ContentsLink[] {
  const $ = cheerio.load(html);
  const self = canonicalizeUrl(pageUrl);
  const links: ContentsLink[] = [];
  const seen = new Set<string>();

  $(CONTENTS_LINK_SELECTOR).each((_, anchor) => {
    const href = $(anchor).attr('href');
    if (!href) {
      return;
    }

    let url: string;
    try {
      url = canonicalizeUrl(new URL(href, pageUrl).toString());
    } catch {
      return;
    }
    if (url === self || seen.has(url) || !/^https?:$/.test(new URL(url).protocol)) {
      return;
    }
    seen.add(url);
    links.push({ url, title: cellText($(anchor).text()) });
  });

  return links;
}
