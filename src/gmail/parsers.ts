/**
 * Gmail API messages to tool responses
 */
import parseMessage from 'gmail-api-parse-message';
import type { gmail_v1 } from 'googleapis';
import type { GmailAttachmentRef, GmailReadResponse, GmailSearchHit } from './types.js';

export const SEARCH_HIT_HEADERS = ['From', 'Subject', 'Date'];

const NO_SUBJECT = '(No subject)';

/**
 * Header value by case-insensitive name, '' when absent
 */
export function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[] | undefined,
  name: string
): string {
  return headers?.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value || '';
}

export function parseSearchHit(message: gmail_v1.Schema$Message): GmailSearchHit {
  const headers = message.payload?.headers;
  const labelIds = message.labelIds || [];

  return {
    id: message.id || '',
    threadId: message.threadId || '',
    from: getHeader(headers, 'From'),
    subject: getHeader(headers, 'Subject') || NO_SUBJECT,
    date: getHeader(headers, 'Date'),
    snippet: message.snippet || '',
    unread: labelIds.includes('UNREAD'),
    labelIds
  };
}

/**
 * Message fetched with format=full; MIME walking and base64url decoding are
 * done by gmail-api-parse-message
 */
export function parseReadResponse(message: gmail_v1.Schema$Message): GmailReadResponse {
  const headers = message.payload?.headers;
  const parsed = parseMessage(message);

  const attachments: GmailAttachmentRef[] = (parsed.attachments || []).map(att => ({
    attachmentId: att.attachmentId || '',
    filename: att.filename || 'unnamed',
    mimeType: att.mimeType || 'application/octet-stream',
    size: att.size || 0
  }));

  return {
    id: message.id || '',
    threadId: message.threadId || '',
    labelIds: message.labelIds || [],
    subject: getHeader(headers, 'Subject') || NO_SUBJECT,
    date: getHeader(headers, 'Date'),
    headers: {
      from: getHeader(headers, 'From'),
      to: getHeader(headers, 'To'),
      cc: getHeader(headers, 'Cc')
    },
    body: {
      text: parsed.textPlain || null,
      html: parsed.textHtml || null
    },
    attachments
  };
}
