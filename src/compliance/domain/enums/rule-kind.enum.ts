export enum RuleKind {
  DOCUMENT_FORMAT = 'document-format',
  SCHEMA_VERSION = 'schema-version',
  NO_MACROS = 'no-macros',
  REQUIRED_SECTION = 'required-section',
  SECTION_ORDER = 'section-order',
  STYLE_PROPERTY = 'style-property',
  ALLOWED_STYLES = 'allowed-styles',
  REQUIRED_METADATA = 'required-metadata',
}
