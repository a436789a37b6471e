/**
 * Drive API type definitions
 */

/**
 * Drive file summary (search results)
 */
export interface DriveFileSummary {
  id: string;
  name: string;
  mimeType: string;
  isFolder: boolean;
  size?: number;  // Folders and Google Docs don't have size
  modifiedTime: string;  // ISO 8601 datetime
  webViewLink: string;
  parents?: string[];
}

export interface DriveFileOwner {
  displayName: string;
  emailAddress: string;
}

/**
 * Full file metadata (drive_get_metadata)
 */
export interface DriveFileMetadata extends DriveFileSummary {
  createdTime: string;
  description: string | null;
  starred: boolean;
  driveId: string | null;  // Set for files on a shared drive
  owners: DriveFileOwner[];
}

export interface DriveSearchResult {
  files: DriveFileSummary[];
  nextPageToken: string | null;
}

export interface DriveGetMetadataResult {
  file: DriveFileMetadata;
}
