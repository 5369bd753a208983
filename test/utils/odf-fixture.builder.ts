import { strToU8, zipSync, Zippable } from 'fflate';

export type FixtureBlock =
  | { heading: string; level?: number; style?: string }
  | { paragraph: string; style?: string };

export interface FixtureStyle {
  name: string;
  family?: string;
  text?: Record<string, string>;
  paragraph?: Record<string, string>;
}

export interface OdfFixture {
  version?: string | null;
  mimeType?: string;
  body?: FixtureBlock[];
  styles?: FixtureStyle[];
  automaticStyles?: Array<{ name: string; parent: string }>;
  metadata?: Record<string, string>;
  macros?: boolean;
}

export const GOLDEN_STYLES: FixtureStyle[] = [
  {
    name: 'Heading_20_1',
    text: { 'fo:font-size': '16pt', 'fo:font-weight': 'bold' },
  },
  { name: 'Heading_20_2', text: { 'fo:font-size': '14pt' } },
  {
    name: 'Text_20_body',
    text: { 'fo:font-size': '11pt' },
    paragraph: { 'fo:text-align': 'justify' },
  },
];

export const GOLDEN_BODY: FixtureBlock[] = [
  { heading: 'Introduction', level: 1, style: 'Heading_20_1' },
  { paragraph: 'Purpose of this manual.', style: 'Text_20_body' },
  { heading: 'Scope', level: 2, style: 'Heading_20_2' },
  { paragraph: 'Applies to every site.', style: 'Text_20_body' },
  { heading: 'Requirements', level: 1, style: 'Heading_20_1' },
  { paragraph: 'Records are kept for ten years.', style: 'P1' },
  { heading: 'Approval', level: 1, style: 'Heading_20_1' },
  { paragraph: 'Signed by the board.', style: 'Text_20_body' },
];

export const GOLDEN_METADATA: Record<string, string> = {
  title: 'Quality Manual',
  creator: 'test-author',
  language: 'en-US',
  generator: 'fixture-builder/1.0',
  'creation-date': '2026-01-05T10:00:00',
};

const NAMESPACES =
  'xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0" ' +
  'xmlns:style="urn:oasis:names:tc:opendocument:xmlns:style:1.0" ' +
  'xmlns:text="urn:oasis:names:tc:opendocument:xmlns:text:1.0" ' +
  'xmlns:fo="urn:oasis:names:tc:opendocument:xmlns:xsl-fo-compatible:1.0" ' +
  'xmlns:dc="http://purl.org/dc/elements/1.1/" ' +
  'xmlns:meta="urn:oasis:names:tc:opendocument:xmlns:meta:1.0"';

const DUBLIN_CORE = new Set(['title', 'subject', 'description', 'language', 'creator', 'date']);

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function attributes(values: Record<string, string> | undefined): string {
  return Object.entries(values ?? {})
    .map(([key, value]) => ` ${key}="${escapeXml(value)}"`)
    .join('');
}

function withDefaults(fixture: OdfFixture): Required<OdfFixture> {
  return {
    version: fixture.version === undefined ? '1.2' : fixture.version,
    mimeType: fixture.mimeType ?? 'application/vnd.oasis.opendocument.text',
    body: fixture.body ?? GOLDEN_BODY,
    styles: fixture.styles ?? GOLDEN_STYLES,
    automaticStyles: fixture.automaticStyles ?? [
      { name: 'P1', parent: 'Text_20_body' },
    ],
    metadata: fixture.metadata ?? GOLDEN_METADATA,
    macros: fixture.macros ?? false,
  };
}

function versionAttribute(version: string | null): string {
  return version === null ? '' : ` office:version="${version}"`;
}

function stylesXml(styles: FixtureStyle[]): string {
  const body = styles
    .map((style) => {
      const text = style.text
        ? `<style:text-properties${attributes(style.text)}/>`
        : '';
      const paragraph = style.paragraph
        ? `<style:paragraph-properties${attributes(style.paragraph)}/>`
        : '';
      return (
        `<style:style style:name="${style.name}" style:family="${style.family ?? 'paragraph'}">` +
        `${paragraph}${text}</style:style>`
      );
    })
    .join('');
  return `<office:styles>${body}</office:styles>`;
}

function automaticStylesXml(styles: Array<{ name: string; parent: string }>): string {
  const body = styles
    .map(
      (style) =>
        `<style:style style:name="${style.name}" style:family="paragraph" style:parent-style-name="${style.parent}"/>`,
    )
    .join('');
  return `<office:automatic-styles>${body}</office:automatic-styles>`;
}

function bodyXml(blocks: FixtureBlock[]): string {
  const content = blocks
    .map((block) => {
      if ('heading' in block) {
        const style = block.style ? ` text:style-name="${block.style}"` : '';
        return `<text:h${style} text:outline-level="${block.level ?? 1}">${escapeXml(block.heading)}</text:h>`;
      }
      const style = block.style ? ` text:style-name="${block.style}"` : '';
      return `<text:p${style}>${escapeXml(block.paragraph)}</text:p>`;
    })
    .join('');
  return `<office:body><office:text>${content}</office:text></office:body>`;
}

function metaXml(metadata: Record<string, string>): string {
  const fields = Object.entries(metadata)
    .map(([key, value]) => {
      const tag = DUBLIN_CORE.has(key) ? `dc:${key}` : `meta:${key}`;
      return `<${tag}>${escapeXml(value)}</${tag}>`;
    })
    .join('');
  return `<office:meta>${fields}</office:meta>`;
}

/**
 * Builds a packaged (zip) text document with the given structure. Every
 * option defaults to the golden manual used across the compliance tests.
 */
export function buildOdt(fixture: OdfFixture = {}): Uint8Array {
  const doc = withDefaults(fixture);
  const xmlHeader = '<?xml version="1.0" encoding="UTF-8"?>';

  const files: Zippable = {
    mimetype: [strToU8(doc.mimeType), { level: 0 }],
    'content.xml': strToU8(
      `${xmlHeader}<office:document-content ${NAMESPACES}${versionAttribute(doc.version)}>` +
        `${automaticStylesXml(doc.automaticStyles)}${bodyXml(doc.body)}</office:document-content>`,
    ),
    'styles.xml': strToU8(
      `${xmlHeader}<office:document-styles ${NAMESPACES}${versionAttribute(doc.version)}>` +
        `${stylesXml(doc.styles)}</office:document-styles>`,
    ),
    'meta.xml': strToU8(
      `${xmlHeader}<office:document-meta ${NAMESPACES}${versionAttribute(doc.version)}>` +
        `${metaXml(doc.metadata)}</office:document-meta>`,
    ),
  };
  if (doc.macros) {
    files['Basic/Standard/Module1.xml'] = strToU8('<script/>');
  }
  return zipSync(files);
}

// Single-file XML flavour of the same document.
export function buildFlatOdt(fixture: OdfFixture = {}): Uint8Array {
  const doc = withDefaults(fixture);
  const scripts = doc.macros
    ? '<office:scripts><office:script script:language="ooo:Basic" xmlns:script="urn:oasis:names:tc:opendocument:xmlns:script:1.0"/></office:scripts>'
    : '';
  return strToU8(
    '<?xml version="1.0" encoding="UTF-8"?>' +
      `<office:document ${NAMESPACES}${versionAttribute(doc.version)} office:mimetype="${doc.mimeType}">` +
      `${metaXml(doc.metadata)}${scripts}${stylesXml(doc.styles)}` +
      `${automaticStylesXml(doc.automaticStyles)}${bodyXml(doc.body)}</office:document>`,
  );
}
