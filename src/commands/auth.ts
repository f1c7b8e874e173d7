/**
 * Auth Command
 * Login, session status, logout and the current profile
 */

import { Command } from 'commander';
import type { Credential } from '../types/auth.js';
import { createLoginFlow, getClientContext, requireClientId } from '../lib/api-client.js';
import { formatJSON, output } from '../utils/output.js';
import { runCommand } from '../utils/command.js';

export interface SessionStatus {
  loggedIn: boolean;
  valid: boolean;
  canRefresh: boolean;
  expiresAt: string | null;
}

/**
 * Describe a stored credential without touching the network
 */
export function describeSession(credential: Credential | undefined, now: number = Date.now()): SessionStatus {
  if (!credential) {
    return { loggedIn: false, valid: false, canRefresh: false, expiresAt: null };
  }
  return {
    loggedIn: true,
    valid: now < credential.expiresAt,
    canRefresh: credential.refreshToken !== undefined,
    expiresAt: new Date(credential.expiresAt).toISOString(),
  };
}

export const authCommand = new Command('auth').description('Manage the login session');

authCommand
  .command('login')
  .description('Log in through the browser (authorization code with PKCE)')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      const flow = createLoginFlow(context);

      await flow.login({
        signal,
        onAuthorizationUrl: (url) => {
          console.error('Open this URL in your browser to log in:\n');
          console.error(`  ${url}\n`);
          console.error('Waiting for the authorization callback (Ctrl-C to cancel)...');
        },
      });

      const profile = await context.library.getCurrentUser(signal);
      if (format === 'json') {
        console.log(formatJSON({ success: true, user: profile }));
      } else {
        console.log(`Logged in as ${profile.display_name ?? profile.id}`);
      }
    });
  });

authCommand
  .command('status')
  .description('Show the stored session without contacting the service')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format }) => {
      const status = describeSession(getClientContext().authority.peekCredential());
      if (format === 'json') {
        console.log(formatJSON(status));
        return;
      }
      console.log(
        output(
          [status],
          [
            { key: 'loggedIn', label: 'Logged in' },
            { key: 'valid', label: 'Token valid' },
            { key: 'canRefresh', label: 'Refreshable' },
            { key: 'expiresAt', label: 'Expires at' },
          ],
          format
        )
      );
    });
  });

authCommand
  .command('whoami')
  .description('Show the profile of the logged-in user')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format, signal }) => {
      const context = getClientContext();
      requireClientId(context.config);
      const profile = await context.library.getCurrentUser(signal);
      console.log(
        output(
          [profile],
          [
            { key: 'id', label: 'ID' },
            { key: 'display_name', label: 'Name' },
            { key: 'country', label: 'Country' },
            { key: 'product', label: 'Plan' },
          ],
          format
        )
      );
    });
  });

authCommand
  .command('logout')
  .description('Forget the stored credential')
  .action(async (_options, cmd: Command) => {
    await runCommand(cmd, async ({ format }) => {
      getClientContext().authority.invalidate('logout');
      if (format === 'json') {
        console.log(formatJSON({ success: true }));
      } else {
        console.log('Logged out.');
      }
    });
  });
