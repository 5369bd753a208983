import { ownValue } from '../../../utils/own-value';
import { RuleKind } from '../enums/rule-kind.enum';
import { RuleSeverity } from '../enums/rule-severity.enum';
import { Finding } from '../types/compliance-evaluation.type';
import {
  AllowedStylesRule,
  RequiredMetadataRule,
  RequiredSectionRule,
  Rule,
  SectionOrderRule,
  StylePropertyRule,
} from '../types/rule.type';
import { StructuralProfile } from '../types/structural-profile.type';

function violation(rule: Rule, location: string, message: string): Finding {
  return { ruleId: rule.id, severity: rule.severity, location, message };
}

function checkRequiredSection(
  rule: RequiredSectionRule,
  profile: StructuralProfile,
): Finding[] {
  const { title, level } = rule.params;
  const present = profile.headings.some(
    (heading) => heading.title === title && heading.level === level,
  );
  return present
    ? []
    : [
        violation(
          rule,
          `section:${title}`,
          `Missing mandatory section "${title}" at level ${level}`,
        ),
      ];
}

function checkSectionOrder(
  rule: SectionOrderRule,
  profile: StructuralProfile,
): Finding[] {
  const titles = profile.headings.map((heading) => heading.title);
  const present = rule.params.titles.filter((title) => titles.includes(title));

  for (let i = 1; i < present.length; i++) {
    if (titles.indexOf(present[i]) < titles.indexOf(present[i - 1])) {
      return [
        violation(
          rule,
          `section:${present[i]}`,
          `Section "${present[i]}" appears before "${present[i - 1]}"`,
        ),
      ];
    }
  }
  return [];
}

function checkStyleProperty(
  rule: StylePropertyRule,
  profile: StructuralProfile,
): Finding[] {
  const { styleName, property, expected } = rule.params;
  const style = ownValue(profile.styles, styleName);
  const actual = style ? ownValue(style.properties, property) : undefined;

  // Only a style the document actually defines can deviate.
  if (actual === undefined || actual === expected) {
    return [];
  }
  return [
    violation(
      rule,
      `style:${styleName}`,
      `Style "${styleName}" ${property} is "${actual}", expected "${expected}"`,
    ),
  ];
}

function checkAllowedStyles(
  rule: AllowedStylesRule,
  profile: StructuralProfile,
): Finding[] {
  const allowed = new Set(rule.params.styles);
  return profile.usedStyles
    .filter((style) => !allowed.has(style))
    .map((style) =>
      violation(rule, `style:${style}`, `Style "${style}" is not allowed`),
    );
}

function checkRequiredMetadata(
  rule: RequiredMetadataRule,
  profile: StructuralProfile,
): Finding[] {
  const { field, expected } = rule.params;
  const location = `meta:${field}`;

  const actual = ownValue(profile.metadata, field);
  if (actual === undefined) {
    return [
      violation(rule, location, `Missing required metadata field "${field}"`),
    ];
  }
  if (expected !== undefined && actual !== expected) {
    return [
      {
        ruleId: rule.id,
        severity: RuleSeverity.WARNING,
        location,
        message: `Metadata "${field}" is "${actual}", expected "${expected}"`,
      },
    ];
  }
  return [];
}

/**
 * Pure check of one rule against one profile. Rules loaded from storage may
 * carry a kind this build does not know; those yield a warning.
 */
export function checkRule(rule: Rule, profile: StructuralProfile): Finding[] {
  const { id, kind } = rule;

  switch (rule.kind) {
    case RuleKind.DOCUMENT_FORMAT:
      return profile.mimeType === rule.params.mimeType
        ? []
        : [
            violation(
              rule,
              'package:mimetype',
              `Document is "${profile.mimeType}", expected "${rule.params.mimeType}"`,
            ),
          ];
    case RuleKind.SCHEMA_VERSION:
      return profile.odfVersion === rule.params.version
        ? []
        : [
            violation(
              rule,
              'document:version',
              `Document declares version "${profile.odfVersion ?? 'none'}", expected "${rule.params.version}"`,
            ),
          ];
    case RuleKind.NO_MACROS:
      return profile.hasMacros
        ? [violation(rule, 'package:scripts', 'Document embeds macros')]
        : [];
    case RuleKind.REQUIRED_SECTION:
      return checkRequiredSection(rule, profile);
    case RuleKind.SECTION_ORDER:
      return checkSectionOrder(rule, profile);
    case RuleKind.STYLE_PROPERTY:
      return checkStyleProperty(rule, profile);
    case RuleKind.ALLOWED_STYLES:
      return checkAllowedStyles(rule, profile);
    case RuleKind.REQUIRED_METADATA:
      return checkRequiredMetadata(rule, profile);
    default:
      return [
        {
          ruleId: id,
          severity: RuleSeverity.WARNING,
          location: 'rule',
          message: `Unknown rule kind "${String(kind)}"; rule skipped`,
        },
      ];
  }
}
