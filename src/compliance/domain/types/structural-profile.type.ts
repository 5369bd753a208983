export type OdfPackaging = 'package' | 'flat';

export interface HeadingEntry {
  title: string;
  level: number;
}

export interface StyleDefinition {
  name: string;
  family: string;
  parentStyleName?: string;
  // Keyed "<group>/<attribute>", e.g. "text/fo:font-size"
  properties: Record<string, string>;
}

/**
 * Everything the rule predicates may look at. Built once per parse and never
 * mutated afterwards.
 */
export interface StructuralProfile {
  packaging: OdfPackaging;
  mimeType: string;
  odfVersion: string | null;
  headings: HeadingEntry[];
  styles: Record<string, StyleDefinition>;
  usedStyles: string[];
  metadata: Record<string, string>;
  hasMacros: boolean;
}
