/**
 * Email Commands
 *
 * - `email status`: whether results can be mailed, and what is missing
 * - `email auth`: one-time Gmail authorization (copy-paste OAuth flow)
 *
 * @module cli/commands/email
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { config } from '../../config/index.js';
import { loadRunConfig } from '../../storage/config.js';
import { GmailAuth, SETUP_INSTRUCTIONS } from '../../notify/gmail-auth.js';
import type { EmailSettings } from '../../schemas/run-config.js';
import { BaseCommand, getBaseCommand } from '../base-command.js';

// ============================================================================
// Types
// ============================================================================

export type TokenState = 'missing' | 'valid' | 'expired' | 'refreshable';

export interface EmailStatus {
  enabled: boolean;
  recipient?: string;
  sender?: string;
  credentialsPath: string;
  hasCredentials: boolean;
  tokenPath: string;
  token: TokenState;
  /** Whether `search --email` will send */
  ready: boolean;
}

/** Reads one line of user input */
export type Prompt = (question: string) => Promise<string>;

// ============================================================================
// Status
// ============================================================================

/**
 * Inspect email settings, credentials and the token cache.
 */
export async function getEmailStatus(settings: EmailSettings, auth: GmailAuth): Promise<EmailStatus> {
  const hasCredentials = await auth.hasCredentials();
  const token = await auth.loadToken();

  let tokenState: TokenState = 'missing';
  if (token) {
    tokenState = auth.isFresh(token) ? 'valid' : token.refreshToken ? 'refreshable' : 'expired';
  }

  return {
    enabled: settings.enabled,
    recipient: settings.recipient,
    sender: settings.senderEmail,
    credentialsPath: auth.credentialsPath,
    hasCredentials,
    tokenPath: auth.tokenPath,
    token: tokenState,
    ready: settings.enabled && !!settings.recipient && (hasCredentials || token !== undefined),
  };
}

const TOKEN_LABELS: Record<TokenState, string> = {
  missing: 'not authorized',
  valid: 'valid',
  expired: 'expired (run email auth again)',
  refreshable: 'expired, will refresh on next send',
};

function mark(ok: boolean): string {
  return ok ? chalk.green('✅') : chalk.red('❌');
}

/**
 * Print the status report.
 */
export function printEmailStatus(status: EmailStatus, base: BaseCommand): void {
  base.section('Email Configuration');
  console.log(`${mark(status.enabled)} Enabled: ${status.enabled ? 'yes' : 'no'}`);
  console.log(`${mark(!!status.recipient)} Recipient: ${status.recipient ?? 'not set (email.recipient)'}`);
  console.log(`   Sender: ${status.sender ?? 'authorized Gmail account'}`);
  console.log(`${mark(status.hasCredentials)} Credentials: ${status.credentialsPath}`);
  const tokenUsable = status.token === 'valid' || status.token === 'refreshable';
  console.log(`${mark(tokenUsable)} Token: ${TOKEN_LABELS[status.token]}`);
  console.log();

  if (status.ready) {
    base.success('Email delivery is ready');
  } else {
    base.fail('Email delivery is not ready');
  }

  if (!status.hasCredentials) {
    console.log();
    console.log('To set up Gmail:');
    SETUP_INSTRUCTIONS.forEach((step, i) => console.log(`  ${i + 1}. ${step}`));
  } else if (status.token === 'missing' || status.token === 'expired') {
    console.log();
    console.log('Run: donation-finder email auth');
  }
}

// ============================================================================
// Authorization
// ============================================================================

/**
 * Interactive authorization: print the consent URL, read the code, store
 * the token.
 *
 * @throws AuthSetupError if credentials are missing or the code is rejected
 */
export async function authorizeGmail(auth: GmailAuth, prompt: Prompt, base: BaseCommand): Promise<void> {
  const credentials = await auth.loadCredentials();

  console.log('Open this URL in your browser and approve access:');
  console.log();
  console.log(chalk.cyan(auth.buildConsentUrl(credentials)));
  console.log();
  console.log('After approving, the browser is sent to a page that may not load.');
  console.log('Copy the full address from the address bar (or just the code parameter).');
  console.log();

  const answer = await prompt('Authorization code or redirect URL: ');
  await auth.exchangeCode(answer);

  base.success(`Gmail authorized; token saved to ${auth.tokenPath}`);
}

/**
 * Prompt on stdin/stdout.
 */
export async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

// ============================================================================
// Command Registration
// ============================================================================

function createAuth(base: BaseCommand): GmailAuth {
  return new GmailAuth({
    credentialsPath: config.paths.gmailCredentials,
    tokenPath: config.paths.gmailToken,
    logger: base,
  });
}

/**
 * Register the email command group.
 */
export function registerEmailCommands(program: Command): void {
  const email = program.command('email').description('Set up and check email delivery');

  email
    .command('status')
    .description('Show whether results can be mailed')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        const runConfig = await loadRunConfig(base.configPath, base);
        printEmailStatus(await getEmailStatus(runConfig.email, createAuth(base)), base);
      } catch (error) {
        base.exitWith(base.reportError(error));
      }
    });

  email
    .command('auth')
    .description('Authorize Gmail sending (one-time setup)')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const base = getBaseCommand(cmd);
      try {
        await authorizeGmail(createAuth(base), promptLine, base);
      } catch (error) {
        base.exitWith(base.reportError(error));
      }
    });
}
