import { strFromU8, unzipSync } from 'fflate';
import {
  HeadingEntry,
  OdfPackaging,
  StructuralProfile,
  StyleDefinition,
} from '../types/structural-profile.type';
import {
  childElements,
  descendants,
  findChild,
  localName,
  MalformedDocumentError,
  parseXml,
  textContent,
  XmlElement,
} from './xml-tree';
import { describeError } from '../../../utils/errors/domain-errors';

export const ODF_TEXT_MIMETYPE = 'application/vnd.oasis.opendocument.text';

export interface ParseLimits {
  maxDocumentBytes: number;
  // Bound on each decompressed package part
  maxPartBytes: number;
}

export const DEFAULT_PARSE_LIMITS: ParseLimits = {
  maxDocumentBytes: 20 * 1024 * 1024,
  maxPartBytes: 50 * 1024 * 1024,
};

export type ParseOutcome =
  | { ok: true; profile: StructuralProfile }
  | { ok: false; reason: string };

const PACKAGE_PARTS = new Set([
  'mimetype',
  'content.xml',
  'styles.xml',
  'meta.xml',
]);

const MACRO_DIRECTORIES = ['Basic/', 'Scripts/'];

const STYLE_PROPERTY_GROUPS = new Map<string, string>([
  ['style:text-properties', 'text'],
  ['style:paragraph-properties', 'paragraph'],
]);

interface DocumentParts {
  packaging: OdfPackaging;
  mimeType: string | undefined;
  content: XmlElement;
  styles: XmlElement | undefined;
  meta: XmlElement | undefined;
  hasMacroEntries: boolean;
}

function isZipArchive(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 4 &&
    bytes[0] === 0x50 &&
    bytes[1] === 0x4b &&
    bytes[2] === 0x03 &&
    bytes[3] === 0x04
  );
}

function readPackage(bytes: Uint8Array, limits: ParseLimits): DocumentParts {
  const entryNames: string[] = [];
  const oversized: string[] = [];

  const files = unzipSync(bytes, {
    filter: (file) => {
      entryNames.push(file.name);
      if (!PACKAGE_PARTS.has(file.name)) {
        return false;
      }
      if (file.originalSize > limits.maxPartBytes) {
        oversized.push(file.name);
        return false;
      }
      return true;
    },
  });

  if (oversized.length > 0) {
    throw new MalformedDocumentError(
      `package part ${oversized[0]} exceeds ${limits.maxPartBytes} bytes`,
    );
  }

  const read = (name: string): string | undefined =>
    name in files ? strFromU8(files[name]) : undefined;

  const content = read('content.xml');
  if (content === undefined) {
    throw new MalformedDocumentError('package has no content.xml');
  }
  const styles = read('styles.xml');
  const meta = read('meta.xml');

  return {
    packaging: 'package',
    mimeType: read('mimetype')?.trim(),
    content: parseXml(content, 'content.xml'),
    styles: styles === undefined ? undefined : parseXml(styles, 'styles.xml'),
    meta: meta === undefined ? undefined : parseXml(meta, 'meta.xml'),
    hasMacroEntries: entryNames.some((name) =>
      MACRO_DIRECTORIES.some((directory) => name.startsWith(directory)),
    ),
  };
}

function readFlat(bytes: Uint8Array): DocumentParts {
  const root = parseXml(strFromU8(bytes), 'document');
  if (root.name !== 'office:document') {
    throw new MalformedDocumentError(
      `unexpected root element ${root.name}, expected office:document`,
    );
  }
  return {
    packaging: 'flat',
    mimeType: root.attributes['office:mimetype'],
    content: root,
    styles: root,
    meta: root,
    hasMacroEntries: false,
  };
}

function readStyles(container: XmlElement | undefined): Map<string, StyleDefinition> {
  const styles = new Map<string, StyleDefinition>();
  if (!container) {
    return styles;
  }

  for (const element of childElements(container, 'style:style')) {
    const name = element.attributes['style:name'];
    if (!name) {
      continue;
    }
    const properties: Record<string, string> = {};
    for (const group of childElements(element)) {
      const prefix = STYLE_PROPERTY_GROUPS.get(group.name);
      if (!prefix) {
        continue;
      }
      for (const [attribute, value] of Object.entries(group.attributes)) {
        properties[`${prefix}/${attribute}`] = value;
      }
    }
    styles.set(name, {
      name,
      family: element.attributes['style:family'] ?? '',
      parentStyleName: element.attributes['style:parent-style-name'],
      properties,
    });
  }
  return styles;
}

function readMetadata(metaRoot: XmlElement | undefined): Record<string, string> {
  const metadata = new Map<string, string>();
  const officeMeta = findChild(metaRoot, 'office:meta');
  if (!officeMeta) {
    return {};
  }

  for (const field of childElements(officeMeta)) {
    const key =
      field.name === 'meta:user-defined'
        ? `user-defined:${field.attributes['meta:name'] ?? ''}`
        : localName(field.name);
    metadata.set(key, textContent(field).trim());
  }
  return Object.fromEntries(metadata);
}

function containsScripts(root: XmlElement): boolean {
  const scripts = findChild(root, 'office:scripts');
  return (
    scripts !== undefined &&
    childElements(scripts, 'office:script').length > 0
  );
}

function buildProfile(parts: DocumentParts): StructuralProfile {
  if (!parts.mimeType) {
    throw new MalformedDocumentError('document declares no mimetype');
  }

  const text = findChild(findChild(parts.content, 'office:body'), 'office:text');
  if (!text) {
    throw new MalformedDocumentError('document has no office:text body');
  }

  const commonStyles = readStyles(findChild(parts.styles, 'office:styles'));
  const automaticStyles = readStyles(
    findChild(parts.content, 'office:automatic-styles'),
  );

  // Automatic styles are per-document direct formatting; report the common
  // style they derive from.
  const resolveStyle = (name: string): string | undefined => {
    const automatic = automaticStyles.get(name);
    if (automatic && !commonStyles.has(name)) {
      return automatic.parentStyleName;
    }
    return name;
  };

  const headings: HeadingEntry[] = [];
  const usedStyles = new Set<string>();

  for (const element of descendants(text)) {
    if (element.name !== 'text:h' && element.name !== 'text:p') {
      continue;
    }
    const styleName = element.attributes['text:style-name'];
    const resolved = styleName ? resolveStyle(styleName) : undefined;
    if (resolved) {
      usedStyles.add(resolved);
    }
    if (element.name === 'text:h') {
      const level = parseInt(element.attributes['text:outline-level'] ?? '1', 10);
      headings.push({
        title: textContent(element).trim(),
        level: Number.isNaN(level) || level < 1 ? 1 : level,
      });
    }
  }

  return {
    packaging: parts.packaging,
    mimeType: parts.mimeType,
    odfVersion: parts.content.attributes['office:version'] ?? null,
    headings,
    styles: Object.fromEntries(commonStyles),
    usedStyles: [...usedStyles].sort(),
    metadata: readMetadata(parts.meta),
    hasMacros: parts.hasMacroEntries || containsScripts(parts.content),
  };
}

/**
 * Parses a text document in OpenDocument format, packaged (zip) or flat XML,
 * into its structural profile. Never throws: any failure is reported as
 * `{ ok: false }` with a reason.
 */
export function parseOdfDocument(
  bytes: Uint8Array,
  limits: ParseLimits = DEFAULT_PARSE_LIMITS,
): ParseOutcome {
  if (bytes.length === 0) {
    return { ok: false, reason: 'document is empty' };
  }
  if (bytes.length > limits.maxDocumentBytes) {
    return {
      ok: false,
      reason: `document exceeds ${limits.maxDocumentBytes} bytes`,
    };
  }

  try {
    const parts = isZipArchive(bytes)
      ? readPackage(bytes, limits)
      : readFlat(bytes);
    return { ok: true, profile: buildProfile(parts) };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}
