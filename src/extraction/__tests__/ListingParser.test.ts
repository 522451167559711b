import { describe, it, expect } from 'vitest';
import { LegislationListingParser } from '../ListingParser.js';

const PAGE_URL = 'https://legislation.test/all/2024?title=planning';

describe('LegislationListingParser', () => {
  const parser = new LegislationListingParser();

  it('reads one entry per result row with its listing cells', () => {
    const html = `<table><tbody>
      <tr><td><a href="/uksi/2024/17">The Town and Country
        Planning Order 2024</a></td><td>2024</td><td>17</td><td>UK Statutory Instruments</td></tr>
      <tr><td><a href="https://legislation.test/ukpga/2024/3">Planning Act 2024</a></td><td>2024</td><td>c. 3</td></tr>
    </tbody></table>`;

    expect(parser.parse(html, PAGE_URL)).toEqual({
      entries: [
        {
          url: 'https://legislation.test/uksi/2024/17',
          listing: {
            title: 'The Town and Country Planning Order 2024',
            year: '2024',
            number: '17',
            documentType: 'UK Statutory Instruments',
          },
        },
        {
          url: 'https://legislation.test/ukpga/2024/3',
          listing: { title: 'Planning Act 2024', year: '2024', number: 'c. 3', documentType: '' },
        },
      ],
      hasNextPage: false,
    });
  });

  it('skips rows without a link and repeated links', () => {
    const html = `<table><tbody>
      <tr><td>No results on this row</td></tr>
      <tr><td><a href="/uksi/2024/1">One</a></td></tr>
      <tr><td><a href="/uksi/2024/1">One again</a></td></tr>
    </tbody></table>`;

    const { entries } = parser.parse(html, PAGE_URL);
    expect(entries.map((entry) => entry.url)).toEqual(['https://legislation.test/uksi/2024/1']);
  });

  it('detects a next page from rel="next" or a Next link', () => {
    expect(parser.parse('<a rel="next" href="?page=2">2</a>', PAGE_URL).hasNextPage).toBe(true);
    expect(parser.parse('<ul><li><a href="?page=2">Next page</a></li></ul>', PAGE_URL).hasNextPage).toBe(true);
    expect(parser.parse('<ul><li><a>Next</a></li></ul>', PAGE_URL).hasNextPage).toBe(false);
    expect(parser.parse('<a href="/about">Nextgen</a>', PAGE_URL).hasNextPage).toBe(false);
  });

  it('returns nothing for a page without results', () => {
    expect(parser.parse('<html><body><p>No items found</p></body></html>', PAGE_URL)).toEqual({
      entries: [],
      hasNextPage: false,
    });
  });
});
