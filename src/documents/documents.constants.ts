// Content is checked by parsing; the type filter only rejects obvious misuse.
export const ACCEPTED_DOCUMENT_MIME_TYPES: readonly string[] = [
  'application/vnd.oasis.opendocument.text',
  'application/vnd.oasis.opendocument.text-template',
  'application/vnd.oasis.opendocument.text-flat-xml',
  'application/xml',
  'text/xml',
  'application/octet-stream',
];

// Upper bound enforced while streaming; the configured limit is checked after.
export const UPLOAD_HARD_LIMIT_BYTES = 200 * 1024 * 1024;
