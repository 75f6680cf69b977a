/**
 * Attachment Loading
 *
 * Resolves attachment paths (`~` expansion, relative to the working
 * directory), checks each one, and reads it fully into memory.
 *
 * The first path that cannot be attached stops the load with an
 * AttachmentError carrying that path; the caller fails the recipient.
 */

import { readFile, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join, resolve } from 'node:path';
import { AttachmentError, errorMessage } from '../errors.js';
import { inferMimeType } from './mime-types.js';
import type { AttachmentPayload } from './types.js';

/** Expands a leading `~` and makes the path absolute. */
export function resolveAttachmentPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return resolve(path);
}

function hasErrnoCode(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

/**
 * Reads one attachment.
 *
 * @throws AttachmentError (not found, not a file, not readable, too large)
 */
export async function loadAttachment(
  path: string,
  maxBytes: number,
): Promise<AttachmentPayload> {
  const resolved = resolveAttachmentPath(path);

  let size: number;
  try {
    const info = await stat(resolved);
    if (!info.isFile()) {
      throw new AttachmentError(resolved, 'is not a file', 'ATTACHMENT_NOT_FILE');
    }
    size = info.size;
  } catch (err) {
    if (err instanceof AttachmentError) throw err;
    if (hasErrnoCode(err, 'ENOENT') || hasErrnoCode(err, 'ENOTDIR')) {
      throw new AttachmentError(resolved, 'not found', 'ATTACHMENT_NOT_FOUND');
    }
    throw new AttachmentError(resolved, `not readable (${errorMessage(err)})`);
  }

  if (size > maxBytes) {
    throw new AttachmentError(
      resolved,
      `too large (${size} bytes, limit ${maxBytes})`,
      'ATTACHMENT_TOO_LARGE',
    );
  }

  let content: Buffer;
  try {
    content = await readFile(resolved);
  } catch (err) {
    throw new AttachmentError(resolved, `not readable (${errorMessage(err)})`);
  }

  const filename = basename(resolved);
  return { filename, mimeType: inferMimeType(filename), content };
}

/** Loads attachments sequentially, preserving order. */
export async function loadAttachments(
  paths: readonly string[],
  maxBytes: number,
): Promise<AttachmentPayload[]> {
  const payloads: AttachmentPayload[] = [];
  for (const path of paths) {
    payloads.push(await loadAttachment(path, maxBytes));
  }
  return payloads;
}
