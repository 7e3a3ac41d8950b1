import { readFileSync } from 'node:fs';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AppContext } from './context.js';
import { usernameOf } from './auth/sessions.js';
import { isoDateSchema, todayIso } from './log/dates.js';
import { targetSchema } from './log/day-summary.js';
import { handleResolveFood } from './tools/resolve-food.js';
import { handleLogFoods } from './tools/log-foods.js';
import { handleGetDaySummary } from './tools/get-day-summary.js';
import { handleClearDay } from './tools/clear-day.js';
import { handleResetEntries } from './tools/reset-entries.js';

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value) }],
  };
}

function errorResult(error: unknown, fallback: string): CallToolResult {
  const message = error instanceof Error ? error.message : fallback;
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

/** The logged-in user behind an MCP request. Throws when the request carries no session. */
function requireUser(authInfo: AuthInfo | undefined): string {
  const username = usernameOf(authInfo);
  if (!username) {
    throw new Error('Not logged in: a session token is required.');
  }
  return username;
}

/** Creates and configures the MCP server with all tool registrations. */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer({
    name: 'calorie-log',
    version: pkg.version,
  });

  registerTools(server, ctx);

  return server;
}

function registerTools(server: McpServer, ctx: AppContext): void {
  const dateInput = isoDateSchema
    .optional()
    .describe('Calendar date as YYYY-MM-DD; defaults to today');
  const targetInput = targetSchema
    .optional()
    .describe('Daily target in kcal (1500-3000, steps of 100); defaults to 2000');

  server.registerTool(
    'resolve_food',
    {
      description:
        'Estimate calories for one free-text food phrase (e.g. "2 roti", "chicken biryani") without logging it',
      inputSchema: {
        phrase: z.string().min(1).describe('One food phrase, optionally with a quantity'),
      },
    },
    ({ phrase }) => {
      try {
        return jsonResult(handleResolveFood(ctx, { phrase }));
      } catch (error) {
        return errorResult(error, 'Unknown error resolving food');
      }
    },
  );

  server.registerTool(
    'log_foods',
    {
      description:
        'Log what the user ate. Items are separated by commas or new lines; each is resolved to a calorie estimate and added to the day.',
      inputSchema: {
        text: z.string().describe('Foods eaten, separated by commas or new lines'),
        date: dateInput,
      },
    },
    ({ text, date }, extra) => {
      try {
        const username = requireUser(extra.authInfo);
        return jsonResult(
          handleLogFoods(ctx, { username, date: date ?? todayIso(), text }),
        );
      } catch (error) {
        return errorResult(error, 'Unknown error logging foods');
      }
    },
  );

  server.registerTool(
    'get_day_summary',
    {
      description:
        'Get the day log: entries, calorie total, illustrative macro split, progress against a target, swap tips, and activity suggestions',
      inputSchema: {
        date: dateInput,
        target: targetInput,
      },
    },
    ({ date, target }, extra) => {
      try {
        const username = requireUser(extra.authInfo);
        return jsonResult(
          handleGetDaySummary(ctx, { username, date: date ?? todayIso(), target }),
        );
      } catch (error) {
        return errorResult(error, 'Unknown error reading the day log');
      }
    },
  );

  server.registerTool(
    'clear_day',
    {
      description: 'Remove every entry logged on one date',
      inputSchema: {
        date: dateInput,
      },
    },
    ({ date }, extra) => {
      try {
        const username = requireUser(extra.authInfo);
        return jsonResult(
          handleClearDay(ctx, { username, date: date ?? todayIso() }),
        );
      } catch (error) {
        return errorResult(error, 'Unknown error clearing the day');
      }
    },
  );

  server.registerTool(
    'reset_entries',
    {
      description:
        "Delete all of the user's logged entries on every date. The account is kept.",
      inputSchema: {},
    },
    (_args, extra) => {
      try {
        const username = requireUser(extra.authInfo);
        return jsonResult(handleResetEntries(ctx, { username }));
      } catch (error) {
        return errorResult(error, 'Unknown error resetting entries');
      }
    },
  );
}
