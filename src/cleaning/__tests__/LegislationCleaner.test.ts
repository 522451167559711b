import { describe, it, expect } from 'vitest';
import { cleanDocument, parseSectionHeading, type CleanContext } from '../LegislationCleaner.js';
import { METADATA_KEYS } from '../documentMetadata.js';
import { CleaningFailedError } from '../../utils/pipelineErrors.js';

const context: CleanContext = {
  documentId: 'doc-1',
  category: 'planning',
  timePeriod: 'August/2024',
  listing: { title: 'Listing Title', year: '2024', number: '55', documentType: 'UK Statutory Instruments' },
};

const page = `<html><head><title>Page</title><script>var tracking = 1;</script></head><body>
<nav>Home Browse Search</nav>
<div id="content">
  <h1 class="title">The Planning (Fees) Order 2024</h1>
  <p class="LegSubject">Town and Country Planning, England</p>
  <p>Made   1st August
     2024</p>
  <h2>Part 1 Introduction</h2>
  <p>This Order may be cited as the Planning Order.</p>
  <p class="annotation">Editorial note</p>
  <h2>Schedule 2. Forms</h2>
  <ul><li>Form A</li><li>Form B</li><li>Form B</li></ul>
</div>
<footer>ISBN 978-0-11-000000-1</footer>
</body></html>`;

describe('cleanDocument', () => {
  it('keeps the body text block by block, without navigation, scripts or notes', () => {
    const cleaned = cleanDocument(Buffer.from(page), context);

    expect(cleaned.cleanText).toBe(
      [
        'The Planning (Fees) Order 2024',
        'Town and Country Planning, England',
        'Made 1st August 2024',
        'Part 1 Introduction',
        'This Order may be cited as the Planning Order.',
        'Schedule 2. Forms',
        'Form A',
        'Form B',
      ].join('\n\n')
    );
  });

  it('fills every metadata key from the page, then the listing, then unknown', () => {
    const { metadata } = cleanDocument(Buffer.from(page), context);

    expect(Object.keys(metadata).sort()).toEqual([...METADATA_KEYS].sort());
    expect(metadata).toEqual({
      title: 'The Planning (Fees) Order 2024',
      category: 'planning',
      time_period: 'August/2024',
      year: '2024',
      document_number: '55',
      document_type: 'UK Statutory Instruments',
      enacted_date: 'unknown',
      coming_into_force_date: 'unknown',
      subtitle: 'Town and Country Planning, England',
      isbn: '978-0-11-000000-1',
      extent: 'unknown',
      embedding_quality: 'unknown',
    });
  });

  it('splits the text into heading-delimited sections', () => {
    const { sections } = cleanDocument(Buffer.from(page), context);

    expect(sections).toEqual([
      {
        index: 0,
        sectionType: 'level_1',
        number: '',
        title: 'The Planning (Fees) Order 2024',
        content: 'Town and Country Planning, England\n\nMade 1st August 2024',
      },
      {
        index: 1,
        sectionType: 'part',
        number: '1',
        title: 'Introduction',
        content: 'This Order may be cited as the Planning Order.',
      },
      { index: 2, sectionType: 'schedule', number: '2', title: 'Forms', content: 'Form A\n\nForm B' },
    ]);
  });

  it('keeps text held directly in div and span containers', () => {
    const html = `<html><body><div id="content"><h2>Part 1 General</h2><div class="LegP1ParaText">Planning permission is granted for the development.</div><span>The authority may revoke it.</span></div></body></html>`;

    const cleaned = cleanDocument(Buffer.from(html), context);

    expect(cleaned.cleanText).toBe(
      'Part 1 General\n\nPlanning permission is granted for the development.\n\nThe authority may revoke it.'
    );
    expect(cleaned.sections).toEqual([
      {
        index: 0,
        sectionType: 'part',
        number: '1',
        title: 'General',
        content: 'Planning permission is granted for the development.\n\nThe authority may revoke it.',
      },
    ]);
  });

  it('takes a div once, not again for the spans inside it', () => {
    const html = `<div id="content"><div><div class="LegP2Text">Regulation <span>4</span> applies.</div></div><p>Closing <span>words</span>.</p></div>`;

    expect(cleanDocument(Buffer.from(html), context).cleanText).toBe('Regulation 4 applies.\n\nClosing words.');
  });

  it('reads the text from section pages in order and the metadata from the document page', () => {
    const sectionPages = [
      '<html><body><div id="content"><h2>Regulation 1 Citation</h2><p>This Order may be cited as the Fees Order.</p></div></body></html>',
      '<html><body><nav>Previous Next</nav><div id="content"><h2>Regulation 2 Fees</h2><p>A fee is payable.</p></div></body></html>',
    ].map((html) => Buffer.from(html));

    const cleaned = cleanDocument(Buffer.from(page), context, sectionPages);

    expect(cleaned.cleanText).toBe(
      'Regulation 1 Citation\n\nThis Order may be cited as the Fees Order.\n\nRegulation 2 Fees\n\nA fee is payable.'
    );
    expect(cleaned.metadata.title).toBe('The Planning (Fees) Order 2024');
    expect(cleaned.metadata.isbn).toBe('978-0-11-000000-1');
    expect(cleaned.sections.map((section) => [section.sectionType, section.number, section.title])).toEqual([
      ['regulation', '1', 'Citation'],
      ['regulation', '2', 'Fees'],
    ]);
  });

  it('rejects an unreadable section page', () => {
    expect(() => cleanDocument(Buffer.from(page), context, [Buffer.alloc(0)])).toThrow(CleaningFailedError);
  });

  it('returns the same result for the same input', () => {
    const raw = Buffer.from(page);
    const copy = Buffer.from(raw);

    expect(cleanDocument(raw, context)).toEqual(cleanDocument(raw, context));
    expect(raw.equals(copy)).toBe(true);
  });

  it('falls back to the listing title and the body when the page has no structure', () => {
    const cleaned = cleanDocument(Buffer.from('<html><body><div>Just text</div></body></html>'), context);

    expect(cleaned.cleanText).toBe('Just text');
    expect(cleaned.metadata.title).toBe('Listing Title');
    expect(cleaned.sections).toEqual([{ index: 0, sectionType: 'preamble', number: '', title: '', content: 'Just text' }]);
  });

  it('takes the year from the time period when the listing has none', () => {
    const cleaned = cleanDocument(Buffer.from('<p>text</p>'), {
      ...context,
      timePeriod: 'March/2023',
      listing: { title: '', year: '', number: '', documentType: '' },
    });

    expect(cleaned.metadata).toMatchObject({ year: '2023', title: 'unknown', document_number: 'unknown' });
  });

  it('produces empty text for an empty content area', () => {
    const cleaned = cleanDocument(Buffer.from('<html><body><div id="content"></div></body></html>'), context);

    expect(cleaned.cleanText).toBe('');
    expect(cleaned.sections).toEqual([]);
  });

  it('rejects empty, binary and markup-free input', () => {
    const reasons = [Buffer.alloc(0), Buffer.from([0x3c, 0x70, 0x00, 0x3e]), Buffer.from('plain words only')].map(
      (raw) => {
        try {
          cleanDocument(raw, context);
          return null;
        } catch (error) {
          return error instanceof CleaningFailedError ? error.reason : 'unexpected';
        }
      }
    );

    expect(reasons).toEqual(['empty document', 'binary content (NUL bytes)', 'no markup found']);
  });
});

describe('parseSectionHeading', () => {
  it('recognises legislative divisions', () => {
    expect(parseSectionHeading('Regulation 4: Interpretation', 3)).toEqual({
      sectionType: 'regulation',
      number: '4',
      title: 'Interpretation',
    });
    expect(parseSectionHeading('CHAPTER 2A', 2)).toEqual({ sectionType: 'chapter', number: '2A', title: '' });
  });

  it('falls back to the heading level', () => {
    expect(parseSectionHeading('Explanatory Note', 2)).toEqual({ sectionType: 'level_2', number: '', title: 'Explanatory Note' });
  });
});
