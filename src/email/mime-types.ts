/**
 * Attachment MIME type inference by file extension.
 * Unknown extensions fall back to application/octet-stream.
 */

import { extname } from 'node:path';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Extension (lowercase, no dot) -> MIME type, for common mail attachments */
export const MIME_TYPES_BY_EXTENSION = new Map<string, string>([
  ['pdf', 'application/pdf'],
  ['doc', 'application/msword'],
  ['docx', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'],
  ['xls', 'application/vnd.ms-excel'],
  ['xlsx', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'],
  ['ppt', 'application/vnd.ms-powerpoint'],
  ['pptx', 'application/vnd.openxmlformats-officedocument.presentationml.presentation'],
  ['odt', 'application/vnd.oasis.opendocument.text'],
  ['rtf', 'application/rtf'],
  ['txt', 'text/plain'],
  ['csv', 'text/csv'],
  ['htm', 'text/html'],
  ['html', 'text/html'],
  ['ics', 'text/calendar'],
  ['json', 'application/json'],
  ['xml', 'application/xml'],
  ['zip', 'application/zip'],
  ['gz', 'application/gzip'],
  ['jpg', 'image/jpeg'],
  ['jpeg', 'image/jpeg'],
  ['png', 'image/png'],
  ['gif', 'image/gif'],
  ['webp', 'image/webp'],
  ['svg', 'image/svg+xml'],
  ['tif', 'image/tiff'],
  ['tiff', 'image/tiff'],
  ['mp3', 'audio/mpeg'],
  ['mp4', 'video/mp4'],
  ['eml', 'message/rfc822'],
]);

export function inferMimeType(filename: string): string {
  const ext = extname(filename).slice(1).toLowerCase();
  return MIME_TYPES_BY_EXTENSION.get(ext) ?? DEFAULT_MIME_TYPE;
}
