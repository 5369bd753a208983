import { ownValue } from '../../../utils/own-value';
import { RuleKind } from '../enums/rule-kind.enum';
import { RuleSeverity } from '../enums/rule-severity.enum';
import { Rule } from '../types/rule.type';
import { StructuralProfile } from '../types/structural-profile.type';

// Headings at or above this outline level become mandatory sections.
export const REQUIRED_SECTION_MAX_LEVEL = 2;

// Metadata that changes whenever a document is saved, printed or edited.
export const VOLATILE_METADATA_FIELDS: ReadonlySet<string> = new Set([
  'creation-date',
  'date',
  'document-statistic',
  'editing-cycles',
  'editing-duration',
  'generator',
  'print-date',
  'printed-by',
]);

function deriveSectionRules(profile: StructuralProfile): Rule[] {
  const rules: Rule[] = [];
  const seen = new Set<string>();
  const requiredTitles = new Set<string>();

  for (const heading of profile.headings) {
    if (heading.level > REQUIRED_SECTION_MAX_LEVEL || heading.title === '') {
      continue;
    }
    const key = `${heading.level}:${heading.title}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    requiredTitles.add(heading.title);
    rules.push({
      id: `required-section:${rules.length + 1}`,
      kind: RuleKind.REQUIRED_SECTION,
      severity: RuleSeverity.ERROR,
      description: `Section "${heading.title}" (level ${heading.level}) must be present`,
      params: { title: heading.title, level: heading.level },
    });
  }

  // Order by first appearance at any level, which is what the predicate checks
  const orderedTitles: string[] = [];
  for (const heading of profile.headings) {
    if (requiredTitles.has(heading.title) && !orderedTitles.includes(heading.title)) {
      orderedTitles.push(heading.title);
    }
  }

  if (orderedTitles.length > 1) {
    rules.push({
      id: 'section-order',
      kind: RuleKind.SECTION_ORDER,
      severity: RuleSeverity.ERROR,
      description: 'Mandatory sections must appear in the golden order',
      params: { titles: orderedTitles },
    });
  }
  return rules;
}

function deriveStyleRules(profile: StructuralProfile): Rule[] {
  const rules: Rule[] = [];

  for (const styleName of profile.usedStyles) {
    const style = ownValue(profile.styles, styleName);
    if (!style) {
      continue;
    }
    const properties = Object.entries(style.properties).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
    for (const [property, expected] of properties) {
      rules.push({
        id: `style-property:${styleName}:${property}`,
        kind: RuleKind.STYLE_PROPERTY,
        severity: RuleSeverity.WARNING,
        description: `Style "${styleName}" must keep ${property} = ${expected}`,
        params: { styleName, property, expected },
      });
    }
  }

  if (profile.usedStyles.length > 0) {
    rules.push({
      id: 'allowed-styles',
      kind: RuleKind.ALLOWED_STYLES,
      severity: RuleSeverity.WARNING,
      description: 'Body text may only use the golden style vocabulary',
      params: { styles: [...profile.usedStyles] },
    });
  }
  return rules;
}

function deriveMetadataRules(profile: StructuralProfile): Rule[] {
  return Object.keys(profile.metadata)
    .filter((field) => !VOLATILE_METADATA_FIELDS.has(field))
    .sort()
    .map(
      (field): Rule => ({
        id: `required-metadata:${field}`,
        kind: RuleKind.REQUIRED_METADATA,
        severity: RuleSeverity.ERROR,
        description: `Metadata field "${field}" must be present`,
        params: { field },
      }),
    );
}

/**
 * Turns the structural profile of a golden document into the ordered rule
 * set of a Standard. The golden document itself always satisfies every
 * derived rule, as long as it carries no macros.
 */
export function deriveRules(profile: StructuralProfile): Rule[] {
  const rules: Rule[] = [
    {
      id: 'document-format',
      kind: RuleKind.DOCUMENT_FORMAT,
      severity: RuleSeverity.ERROR,
      description: `Document must be ${profile.mimeType}`,
      params: { mimeType: profile.mimeType },
    },
  ];

  if (profile.odfVersion !== null) {
    rules.push({
      id: 'schema-version',
      kind: RuleKind.SCHEMA_VERSION,
      severity: RuleSeverity.ERROR,
      description: `Document must declare OpenDocument version ${profile.odfVersion}`,
      params: { version: profile.odfVersion },
    });
  }

  rules.push({
    id: 'no-macros',
    kind: RuleKind.NO_MACROS,
    severity: RuleSeverity.ERROR,
    description: 'Document must not embed macros or scripts',
    params: {},
  });

  return [
    ...rules,
    ...deriveSectionRules(profile),
    ...deriveStyleRules(profile),
    ...deriveMetadataRules(profile),
  ];
}
