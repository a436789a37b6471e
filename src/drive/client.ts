/**
 * Drive API client factory
 */
import { google, drive_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

export const DRIVE_READ_SCOPES = [
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/drive.readonly',
  'https://www.googleapis.com/auth/drive.metadata.readonly'
] as const;

export const FILE_SUMMARY_FIELDS = 'id, name, mimeType, size, modifiedTime, webViewLink, parents';
export const FILE_METADATA_FIELDS =
  'id, name, mimeType, size, createdTime, modifiedTime, webViewLink, parents, driveId, description, starred, owners(displayName, emailAddress)';

export function createDriveClient(auth: OAuth2Client): drive_v3.Drive {
  return google.drive({ version: 'v3', auth });
}
