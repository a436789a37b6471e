/**
 * Gmail API client factory
 * Creates Gmail clients from an OAuth2Client that already carries a valid access token
 */
import { google, gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

/** Any of these lets the read-only Gmail tools run */
export const GMAIL_READ_SCOPES = [
  'https://mail.google.com/',
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/gmail.readonly'
] as const;

/**
 * Create an authenticated Gmail API client
 *
 * @example
 * const gmail = createGmailClient(auth);
 * const messages = await gmail.users.messages.list({ userId: 'me' });
 */
export function createGmailClient(auth: OAuth2Client): gmail_v1.Gmail {
  return google.gmail({ version: 'v1', auth });
}
