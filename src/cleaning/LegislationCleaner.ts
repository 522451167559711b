/**
 * LegislationCleaner - raw legislation page to clean text and metadata
 *
 * Pure: the output depends only on the bytes and the crawl context passed in.
 */

import * as cheerio from 'cheerio';
import type { ListingMetadata } from '../extraction/ListingParser.js';
import { CleaningFailedError } from '../utils/pipelineErrors.js';
import { UNKNOWN, emptyMetadata, type DocumentMetadata, type DocumentSection } from './documentMetadata.js';

export interface CleanContext {
  documentId: string;
  category: string;
  timePeriod: string;
  listing: ListingMetadata;
}

export interface CleanedDocument {
  cleanText: string;
  metadata: DocumentMetadata;
  sections: DocumentSection[];
}

const NON_CONTENT_SELECTORS = [
  'script',
  'style',
  'noscript',
  'img',
  'svg',
  'nav',
  'header',
  'footer',
  '.watermark',
  '.print-only',
  '.crest',
  '.annotation',
  '.editorial',
  '.commentary',
  '.note',
  '[role="navigation"]',
];

const CONTENT_ROOT_SELECTORS: cheerio.SelectorType[] = ['#content', '.LegContent', '.legislation-body', '.primaryContent', 'main'];

const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, li, blockquote, pre, dt, dd, td, th, caption';

// Containers that hold text directly, e.g. <div class="LegP1ParaText">
const INLINE_CONTAINER_SELECTOR = 'div, span';

const TEXT_SELECTOR = `${BLOCK_SELECTOR}, ${INLINE_CONTAINER_SELECTOR}`;

const METADATA_SELECTORS: Array<[keyof DocumentMetadata, string]> = [
  ['title', 'h1.title, .title, .LegTitle, h1.pageTitle'],
  ['enacted_date', '.enacted-date, .signedDate, .LegEnactmentDate'],
  ['coming_into_force_date', '.made-date, .comingIntoForce, .LegComingIntoForce'],
  ['document_number', '.doc-number, .documentNumber, .LegNo'],
  ['document_type', '.legislation-type, .documentType'],
  ['subtitle', '.legislation-subtitle, .documentSubtitle, .LegSubject'],
  ['extent', '.extent, .LegExtent'],
];

const ISBN_PATTERN = /ISBN[:\s]*((?:97[89][-\s]?)?[0-9][0-9-]{7,15}[0-9Xx])/;

const SECTION_HEADER_PATTERN = /^(Part|Chapter|Section|Regulation|Article|Schedule)\s+([\w.]+)[:.\s]*(.*)$/i;

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

interface TextBlock {
  text: string;
  headingLevel: number | null;
}

function looksLikeMarkup(html: string): boolean {
  return /<[a-zA-Z!?/]/.test(html);
}

/**
 * Split "Part 2 Development Orders" into its type, number and title
 */
export function parseSectionHeading(heading: string, level: number): Pick<DocumentSection, 'sectionType' | 'number' | 'title'> {
  const match = SECTION_HEADER_PATTERN.exec(heading);
  if (match) {
    return {
      sectionType: match[1].toLowerCase(),
      number: match[2].replace(/\.$/, ''),
      title: match[3].trim(),
    };
  }
  return { sectionType: `level_${level}`, number: '', title: heading };
}

function buildSections(blocks: TextBlock[]): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let current: { header: Pick<DocumentSection, 'sectionType' | 'number' | 'title'>; paragraphs: string[] } | null = null;

  const flush = () => {
    if (current && (current.paragraphs.length > 0 || current.header.sectionType !== 'preamble')) {
      sections.push({ index: sections.length, ...current.header, content: current.paragraphs.join('\n\n') });
    }
  };

  for (const block of blocks) {
    if (block.headingLevel !== null) {
      flush();
      current = { header: parseSectionHeading(block.text, block.headingLevel), paragraphs: [] };
    } else {
      if (!current) {
        current = { header: { sectionType: 'preamble', number: '', title: '' }, paragraphs: [] };
      }
      current.paragraphs.push(block.text);
    }
  }
  flush();
  return sections;
}

function orUnknown(value: string | undefined): string {
  const normalized = normalizeWhitespace(value ?? '');
  return normalized.length > 0 ? normalized : UNKNOWN;
}

function loadPage(raw: Buffer, documentId: string): cheerio.CheerioAPI {
  if (raw.length === 0) {
    throw new CleaningFailedError(documentId, 'empty document');
  }
  if (raw.includes(0)) {
    throw new CleaningFailedError(documentId, 'binary content (NUL bytes)');
  }

  const html = raw.toString('utf8');
  if (!looksLikeMarkup(html)) {
    throw new CleaningFailedError(documentId, 'no markup found');
  }

  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  return $;
}

/**
 * Append the text blocks of one page's content area, skipping a block that
 * repeats the one before it
 */
function collectBlocks($: cheerio.CheerioAPI, blocks: TextBlock[]): void {
  for (const selector of NON_CONTENT_SELECTORS) {
    $(selector).remove();
  }

  let root = $('body');
  for (const selector of CONTENT_ROOT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length > 0) {
      root = candidate;
      break;
    }
  }

  // A div or span counts only when nothing inside it is a block or a div
  const isLeafContainer = (node: typeof root): boolean =>
    node.is(INLINE_CONTAINER_SELECTOR) && node.find(`${BLOCK_SELECTOR}, div`).length === 0;

  const before = blocks.length;
  const push = (block: TextBlock) => {
    const previous = blocks[blocks.length - 1];
    if (!previous || previous.text !== block.text) {
      blocks.push(block);
    }
  };

  root.find(TEXT_SELECTOR).each((_, element) => {
    const node = $(element);
    if (node.find(BLOCK_SELECTOR).length > 0) {
      return;
    }
    if (node.is(INLINE_CONTAINER_SELECTOR)) {
      if (!isLeafContainer(node)) {
        return;
      }
      const enclosing = node.parentsUntil(root).filter((_, ancestor) => {
        const parent = $(ancestor);
        return parent.is(BLOCK_SELECTOR) || isLeafContainer(parent);
      });
      if (enclosing.length > 0) {
        return;
      }
    }
    const text = normalizeWhitespace(node.text());
    if (!text) {
      return;
    }
    const headingMatch = /^h([1-6])$/i.exec(element.tagName);
    push({ text, headingLevel: headingMatch ? parseInt(headingMatch[1], 10) : null });
  });

  if (blocks.length === before) {
    const text = normalizeWhitespace(root.text());
    if (text) {
      push({ text, headingLevel: null });
    }
  }
}

/**
 * Turn a raw page into clean text, fixed-key metadata and sections
 *
 * Metadata always comes from the document page. When section pages were
 * fetched from its table of contents, the text comes from those, in order,
 * instead of the document page.
 *
 * @throws CleaningFailedError when a page is empty, binary, or contains no markup
 */
export function cleanDocument(raw: Buffer, context: CleanContext, sectionPages: readonly Buffer[] = []): CleanedDocument {
  const $ = loadPage(raw, context.documentId);
  const sectionDocs = sectionPages.map((page) => loadPage(page, context.documentId));

  const metadata = emptyMetadata();
  metadata.category = orUnknown(context.category);
  metadata.time_period = orUnknown(context.timePeriod);

  for (const [key, selector] of METADATA_SELECTORS) {
    metadata[key] = orUnknown($(selector).first().text());
  }

  if (metadata.title === UNKNOWN) {
    metadata.title = orUnknown(context.listing.title || $('h1').first().text() || $('title').first().text());
  }
  if (metadata.document_number === UNKNOWN) {
    metadata.document_number = orUnknown(context.listing.number);
  }
  if (metadata.document_type === UNKNOWN) {
    metadata.document_type = orUnknown(context.listing.documentType);
  }
  const periodYear = /(\d{4})$/.exec(context.timePeriod.trim());
  metadata.year = orUnknown(context.listing.year || (periodYear ? periodYear[1] : ''));

  const isbn = ISBN_PATTERN.exec($.root().text());
  if (isbn) {
    metadata.isbn = isbn[1].replace(/\s+/g, '');
  }

  const blocks: TextBlock[] = [];
  for (const page of sectionDocs.length > 0 ? sectionDocs : [$]) {
    collectBlocks(page, blocks);
  }

  return {
    cleanText: blocks.map((block) => block.text).join('\n\n'),
    metadata,
    sections: buildSections(blocks),
  };
}
