/**
 * MIME Message Composition
 *
 * Builds the RFC 2822 message the Gmail API expects in its `raw` field:
 *
 * ```
 * multipart/mixed
 * ├── multipart/alternative
 * │   ├── text/plain
 * │   └── text/html
 * └── application/octet-stream (one per attachment)
 * ```
 *
 * @module notify/mime
 */

import { randomBytes } from 'node:crypto';

/** Base64 lines are wrapped at this width */
const LINE_WIDTH = 76;

const CRLF = '\r\n';

export interface MimeAttachment {
  filename: string;
  content: Buffer;
}

export interface MimeMessage {
  /** Already formatted (see formatAddress); omitted when empty */
  from?: string;
  to: string;
  subject: string;
  text: string;
  html: string;
  attachments?: MimeAttachment[];
}

export interface BuildOptions {
  /** Boundary generator, replaceable in tests */
  boundary?: () => string;
}

function defaultBoundary(): string {
  return `----=_Part_${randomBytes(12).toString('hex')}`;
}

/**
 * Base64 encode and wrap to MIME line width.
 */
export function encodeBase64Lines(content: Buffer | string): string {
  const encoded = Buffer.from(content).toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += LINE_WIDTH) {
    lines.push(encoded.slice(i, i + LINE_WIDTH));
  }
  return lines.join(CRLF);
}

/** 45 bytes encode to 60 base64 characters, keeping each word within 75 */
const ENCODED_WORD_BYTES = 45;

/**
 * Encode a header value as RFC 2047 encoded words when it is not plain
 * ASCII. Long values are split on character boundaries into several words
 * joined by folding whitespace.
 *
 * @example
 * ```typescript
 * encodeHeader('Results'); // 'Results'
 * encodeHeader('Résultats'); // '=?UTF-8?B?UsOpc3VsdGF0cw==?='
 * ```
 */
export function encodeHeader(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) {
    return value;
  }

  const chunks: string[] = [];
  let current = '';
  for (const char of value) {
    if (Buffer.byteLength(current + char, 'utf-8') > ENCODED_WORD_BYTES) {
      chunks.push(current);
      current = '';
    }
    current += char;
  }
  chunks.push(current);

  return chunks
    .map((chunk) => `=?UTF-8?B?${Buffer.from(chunk, 'utf-8').toString('base64')}?=`)
    .join(`${CRLF} `);
}

/**
 * Format a mailbox as `Name <address>`, encoding the display name if needed.
 */
export function formatAddress(name: string | undefined, address: string): string {
  return name ? `${encodeHeader(name)} <${address}>` : address;
}

/**
 * Quote a filename for Content-Type / Content-Disposition parameters.
 */
function quoteParam(value: string): string {
  return `"${encodeHeader(value).replace(/["\\]/g, '\\$&')}"`;
}

function textPart(subtype: 'plain' | 'html', body: string): string {
  return [
    `Content-Type: text/${subtype}; charset="UTF-8"`,
    'Content-Transfer-Encoding: base64',
    '',
    encodeBase64Lines(body),
  ].join(CRLF);
}

function attachmentPart(attachment: MimeAttachment): string {
  const name = quoteParam(attachment.filename);
  return [
    `Content-Type: application/octet-stream; name=${name}`,
    'Content-Transfer-Encoding: base64',
    `Content-Disposition: attachment; filename=${name}`,
    '',
    encodeBase64Lines(attachment.content),
  ].join(CRLF);
}

function multipart(boundary: string, parts: string[]): string {
  return [...parts.map((part) => `--${boundary}${CRLF}${part}`), `--${boundary}--`].join(CRLF);
}

/**
 * Build the full message text.
 */
export function buildMimeMessage(message: MimeMessage, options: BuildOptions = {}): string {
  const nextBoundary = options.boundary ?? defaultBoundary;
  const mixedBoundary = nextBoundary();
  const alternativeBoundary = nextBoundary();

  const alternative = [
    `Content-Type: multipart/alternative; boundary="${alternativeBoundary}"`,
    '',
    multipart(alternativeBoundary, [textPart('plain', message.text), textPart('html', message.html)]),
  ].join(CRLF);

  const headers = [
    'MIME-Version: 1.0',
    `To: ${message.to}`,
    ...(message.from ? [`From: ${message.from}`] : []),
    `Subject: ${encodeHeader(message.subject)}`,
    `Content-Type: multipart/mixed; boundary="${mixedBoundary}"`,
  ];

  const parts = [alternative, ...(message.attachments ?? []).map(attachmentPart)];

  return [...headers, '', multipart(mixedBoundary, parts), ''].join(CRLF);
}

/**
 * Encode a message for the Gmail `raw` field (base64url, no padding).
 */
export function encodeRawMessage(mime: string): string {
  return Buffer.from(mime, 'utf-8').toString('base64url');
}
