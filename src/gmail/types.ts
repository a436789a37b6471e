/**
 * Shapes returned by the gmail_search and gmail_read tools
 */

export interface GmailAddressHeaders {
  from: string;
  to: string;
  cc: string;
}

/** One gmail_search hit: metadata headers and snippet, never the body */
export interface GmailSearchHit {
  id: string;
  threadId: string;
  from: string;
  subject: string;
  date: string;
  snippet: string;
  unread: boolean;
  labelIds: string[];
}

export interface GmailSearchResponse {
  query: string;
  hits: GmailSearchHit[];
  nextPageToken: string | null;
  /** Gmail's estimate across all pages */
  totalEstimate: number;
}

/** Attachment reference; the content is fetched separately by attachmentId */
export interface GmailAttachmentRef {
  attachmentId: string;
  filename: string;
  mimeType: string;
  size: number;
}

export interface GmailReadResponse {
  id: string;
  threadId: string;
  labelIds: string[];
  subject: string;
  date: string;
  headers: GmailAddressHeaders;
  body: {
    text: string | null;
    html: string | null;
  };
  attachments: GmailAttachmentRef[];
}
