import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext } from '../context.js';
import { validateSession } from '../services/session.js';
import { formatError, formatSuccess } from '../utils.js';

export function registerAuthTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'paatshala_login',
    'Log in to Paatshala with a username and password. The session cookie is saved to the credentials file so later runs skip the login.',
    {
      username: z.string().min(1).describe('Paatshala username'),
      password: z.string().min(1).describe('Paatshala password'),
      remember: z.boolean().optional().describe('Also save the username and password to the credentials file (default: false)'),
    },
    async ({ username, password, remember }) => {
      try {
        const result = await ctx.session.loginWith(username, password, remember ?? false);
        if (!result.ok) {
          return formatError('logging in', result.error.message);
        }
        return formatSuccess({
          logged_in: true,
          base_url: ctx.session.baseUrl,
          credentials_saved: remember ?? false,
        });
      } catch (error) {
        return formatError('logging in', error);
      }
    }
  );

  server.tool(
    'paatshala_session_status',
    'Check whether the current Paatshala session is valid and where it came from (configured cookie, stored credentials or interactive login).',
    {},
    async () => {
      try {
        const client = await ctx.client();
        const valid = await validateSession(client);
        return formatSuccess({
          authenticated: valid,
          source: ctx.session.authSource,
          base_url: ctx.session.baseUrl,
        });
      } catch (error) {
        return formatError('checking session', error);
      }
    }
  );

  server.tool(
    'paatshala_logout',
    'Forget the in-memory session. The next tool call authenticates again from the configured cookie or credentials.',
    {},
    async () => {
      ctx.session.logout();
      return formatSuccess({ logged_out: true });
    }
  );
}
