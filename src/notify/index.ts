/**
 * Email Notification
 *
 * Architecture:
 * - report.ts: Plain-text and HTML report bodies
 * - mime.ts: multipart message composition and Gmail raw encoding
 * - gmail-auth.ts: OAuth client secrets, token cache and refresh
 * - email-sender.ts: Gmail send with attachments
 *
 * @module notify
 */

export {
  renderReport,
  renderTextReport,
  renderHtmlReport,
  escapeHtml,
  ratingStars,
  ratingLabel,
  formatTimestamp,
  type ReportInput,
  type RenderedReport,
} from './report.js';

export {
  buildMimeMessage,
  encodeRawMessage,
  encodeBase64Lines,
  encodeHeader,
  formatAddress,
  type MimeMessage,
  type MimeAttachment,
  type BuildOptions,
} from './mime.js';

export {
  GmailAuth,
  AuthSetupError,
  parseAuthCode,
  GMAIL_SCOPES,
  SETUP_INSTRUCTIONS,
  EXPIRY_SKEW_MS,
  type StoredToken,
  type ClientCredentials,
  type GmailAuthOptions,
} from './gmail-auth.js';

export {
  EmailSender,
  GmailApiError,
  buildSubject,
  type EmailSenderOptions,
  type SendResult,
} from './email-sender.js';
