/**
 * Drive API response parsers
 */
import type { drive_v3 } from 'googleapis';
import type { DriveFileMetadata, DriveFileSummary } from './types.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * Parse Drive file metadata to summary
 */
export function parseFileSummary(file: drive_v3.Schema$File): DriveFileSummary {
  const mimeType = file.mimeType || 'application/octet-stream';
  return {
    id: file.id || '',
    name: file.name || 'Untitled',
    mimeType,
    isFolder: mimeType === FOLDER_MIME_TYPE,
    size: file.size ? parseInt(file.size, 10) : undefined,
    modifiedTime: file.modifiedTime || '',
    webViewLink: file.webViewLink || '',
    parents: file.parents || undefined
  };
}

export function parseFileMetadata(file: drive_v3.Schema$File): DriveFileMetadata {
  return {
    ...parseFileSummary(file),
    createdTime: file.createdTime || '',
    description: file.description || null,
    starred: file.starred || false,
    driveId: file.driveId || null,
    owners: (file.owners || []).map(owner => ({
      displayName: owner.displayName || '',
      emailAddress: owner.emailAddress || ''
    }))
  };
}

/** Drive query clause that hides trashed files unless the caller asked about them. */
export function excludeTrashed(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) return 'trashed = false';
  return /\btrashed\b/.test(trimmed) ? trimmed : `(${trimmed}) and trashed = false`;
}
