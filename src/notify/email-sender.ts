/**
 * Results Email Sender
 *
 * Sends a results report, with the output files attached, through the
 * Gmail API.
 *
 * @module notify/email-sender
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { TIMEOUTS } from '../config/index.js';
import type { EmailSettings } from '../schemas/run-config.js';
import type { PlaceRecord } from '../schemas/place.js';
import type { SearchInfo } from '../schemas/search.js';
import { fileExists } from '../storage/atomic.js';
import { silentLogger, type Logger } from '../logger.js';
import type { GmailAuth } from './gmail-auth.js';
import { buildMimeMessage, encodeRawMessage, formatAddress, type MimeAttachment } from './mime.js';
import { renderReport } from './report.js';

// ============================================================================
// Types
// ============================================================================

const SendResponseSchema = z.object({
  id: z.string(),
  threadId: z.string().optional(),
});

const GmailErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

export interface EmailSenderOptions {
  settings: EmailSettings;
  auth: GmailAuth;
  logger?: Logger;
  /** Override the API host (tests) */
  baseUrl?: string;
  /** Fixed report timestamp (tests) */
  now?: () => Date;
}

export interface SendResult {
  messageId: string;
  /** Attachments actually included */
  attachments: number;
}

/**
 * Gmail API error with additional context
 */
export class GmailApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string
  ) {
    super(message);
    this.name = 'GmailApiError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Fill `{searchType}`, `{location}` and `{count}` in a subject template.
 */
export function buildSubject(template: string, info: SearchInfo, count: number): string {
  return template
    .replace(/\{searchType\}/g, info.type || 'Search Results')
    .replace(/\{location\}/g, info.location)
    .replace(/\{count\}/g, String(count));
}

// ============================================================================
// EmailSender
// ============================================================================

/**
 * @example
 * ```typescript
 * const sender = new EmailSender({ settings: runConfig.email, auth });
 * if (await sender.isConfigured()) {
 *   await sender.sendResults(places, searchInfo, savedFiles);
 * }
 * ```
 */
export class EmailSender {
  private readonly settings: EmailSettings;
  private readonly auth: GmailAuth;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly now: () => Date;

  constructor(options: EmailSenderOptions) {
    this.settings = options.settings;
    this.auth = options.auth;
    this.logger = options.logger ?? silentLogger;
    this.baseUrl = options.baseUrl ?? 'https://gmail.googleapis.com/gmail/v1';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Email is enabled, has a recipient, and Gmail credentials or a token
   * exist.
   */
  async isConfigured(): Promise<boolean> {
    if (!this.settings.enabled || !this.settings.recipient) {
      return false;
    }
    return (await this.auth.hasCredentials()) || (await this.auth.hasToken());
  }

  /**
   * Send the results report.
   *
   * Attachment paths that do not exist are skipped.
   *
   * @throws Error if email is disabled or has no recipient
   * @throws AuthSetupError if Gmail is not authorized
   * @throws GmailApiError if the API rejects the message
   */
  async sendResults(places: PlaceRecord[], info: SearchInfo, attachmentPaths: string[] = []): Promise<SendResult> {
    if (!this.settings.enabled) {
      throw new Error('Email sending is disabled in configuration');
    }
    const recipient = this.settings.recipient;
    if (!recipient) {
      throw new Error('No email recipient configured');
    }

    this.logger.info('Authenticating with Gmail API...');
    const accessToken = await this.auth.getAccessToken();

    const subject = buildSubject(this.settings.subjectTemplate, info, places.length);
    const report = renderReport({ places, searchInfo: info, generatedAt: this.now() });
    const attachments = await this.readAttachments(attachmentPaths);
    const from = this.settings.senderEmail
      ? formatAddress(this.settings.senderName, this.settings.senderEmail)
      : undefined;

    const mime = buildMimeMessage({
      from,
      to: recipient,
      subject,
      text: report.text,
      html: report.html,
      attachments,
    });

    this.logger.info(`Sending email to ${recipient}...`);
    this.logger.debug(`Subject: ${subject}`);

    const messageId = await this.send(accessToken, encodeRawMessage(mime));

    this.logger.info(`Email sent (message id ${messageId}) with ${places.length} results`);
    return { messageId, attachments: attachments.length };
  }

  private async readAttachments(paths: string[]): Promise<MimeAttachment[]> {
    const attachments: MimeAttachment[] = [];
    for (const filePath of paths) {
      if (!(await fileExists(filePath))) {
        this.logger.debug(`Attachment not found, skipping: ${filePath}`);
        continue;
      }
      attachments.push({ filename: path.basename(filePath), content: await fs.readFile(filePath) });
    }
    return attachments;
  }

  private async send(accessToken: string, raw: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), TIMEOUTS.gmail);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/users/me/messages/send`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ raw }),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GmailApiError(`Request timed out after ${TIMEOUTS.gmail}ms`, 408, 'TIMEOUT');
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    const body: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsed = GmailErrorSchema.safeParse(body);
      const detail = parsed.success ? parsed.data.error.message ?? response.statusText : response.statusText;
      const status = parsed.success ? parsed.data.error.status ?? 'HTTP_ERROR' : 'HTTP_ERROR';
      const message =
        response.status === 401 || response.status === 403
          ? `Gmail authorization rejected (${detail})`
          : `Gmail API error (${response.status}): ${detail}`;
      throw new GmailApiError(message, response.status, status);
    }

    const parsed = SendResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GmailApiError('Unexpected send response shape', 502, 'INVALID_RESPONSE');
    }
    return parsed.data.id;
  }
}
