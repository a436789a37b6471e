import { describe, expect, it } from 'vitest';
import { FOLDER_MIME_TYPE, excludeTrashed, parseFileMetadata, parseFileSummary } from './parsers.js';

describe('parseFileSummary', () => {
  it('parses a file with a size', () => {
    expect(parseFileSummary({
      id: 'file-1',
      name: 'report.pdf',
      mimeType: 'application/pdf',
      size: '10240',
      modifiedTime: '2025-05-01T10:00:00.000Z',
      webViewLink: 'https://drive.google.com/file/d/file-1/view',
      parents: ['folder-1']
    })).toEqual({
      id: 'file-1',
      name: 'report.pdf',
      mimeType: 'application/pdf',
      isFolder: false,
      size: 10240,
      modifiedTime: '2025-05-01T10:00:00.000Z',
      webViewLink: 'https://drive.google.com/file/d/file-1/view',
      parents: ['folder-1']
    });
  });

  it('flags folders and leaves size undefined', () => {
    const folder = parseFileSummary({ id: 'folder-1', name: 'Plans', mimeType: FOLDER_MIME_TYPE });
    expect(folder.isFolder).toBe(true);
    expect(folder.size).toBeUndefined();
  });
});

describe('parseFileMetadata', () => {
  it('adds owners and timestamps', () => {
    const metadata = parseFileMetadata({
      id: 'file-1',
      name: 'report.pdf',
      mimeType: 'application/pdf',
      createdTime: '2025-04-01T08:00:00.000Z',
      driveId: 'shared-1',
      owners: [{ displayName: 'Alice', emailAddress: 'alice@example.com' }]
    });

    expect(metadata).toMatchObject({
      createdTime: '2025-04-01T08:00:00.000Z',
      description: null,
      starred: false,
      driveId: 'shared-1',
      owners: [{ displayName: 'Alice', emailAddress: 'alice@example.com' }]
    });
  });
});

describe('excludeTrashed', () => {
  it('wraps a query and hides trashed files', () => {
    expect(excludeTrashed("name contains 'report'")).toBe("(name contains 'report') and trashed = false");
  });

  it('keeps a query that already mentions trashed', () => {
    expect(excludeTrashed('trashed = true')).toBe('trashed = true');
  });

  it('lists everything for an empty query', () => {
    expect(excludeTrashed('  ')).toBe('trashed = false');
  });
});
