import { RuleKind } from '../enums/rule-kind.enum';
import { RuleSeverity } from '../enums/rule-severity.enum';

interface RuleBase<K extends RuleKind, P> {
  id: string; // unique within its Standard
  kind: K;
  severity: RuleSeverity;
  description: string;
  params: P;
}

export type DocumentFormatRule = RuleBase<
  RuleKind.DOCUMENT_FORMAT,
  { mimeType: string }
>;

export type SchemaVersionRule = RuleBase<
  RuleKind.SCHEMA_VERSION,
  { version: string }
>;

export type NoMacrosRule = RuleBase<RuleKind.NO_MACROS, Record<string, never>>;

export type RequiredSectionRule = RuleBase<
  RuleKind.REQUIRED_SECTION,
  { title: string; level: number }
>;

export type SectionOrderRule = RuleBase<
  RuleKind.SECTION_ORDER,
  { titles: string[] }
>;

export type StylePropertyRule = RuleBase<
  RuleKind.STYLE_PROPERTY,
  { styleName: string; property: string; expected: string }
>;

export type AllowedStylesRule = RuleBase<
  RuleKind.ALLOWED_STYLES,
  { styles: string[] }
>;

/**
 * A missing field violates the rule at its own severity. When `expected` is
 * set, a differing value is only ever a warning.
 */
export type RequiredMetadataRule = RuleBase<
  RuleKind.REQUIRED_METADATA,
  { field: string; expected?: string }
>;

export type Rule =
  | DocumentFormatRule
  | SchemaVersionRule
  | NoMacrosRule
  | RequiredSectionRule
  | SectionOrderRule
  | StylePropertyRule
  | AllowedStylesRule
  | RequiredMetadataRule;
