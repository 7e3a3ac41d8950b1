import express, {
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import { randomUUID } from 'node:crypto';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { requireBearerAuth } from '@modelcontextprotocol/sdk/server/auth/middleware/bearerAuth.js';
import { z } from 'zod';
import type { AppContext } from './context.js';
import { createMcpServer } from './server.js';
import {
  AccountError,
  handleLogin,
  handleLogout,
  handleResume,
  handleSignup,
  type AccountErrorCode,
} from './auth/accounts.js';
import { usernameOf } from './auth/sessions.js';
import { isoDateSchema, todayIso } from './log/dates.js';
import { targetSchema } from './log/day-summary.js';
import { handleResolveFood } from './tools/resolve-food.js';
import { handleLogFoods } from './tools/log-foods.js';
import { handleGetDaySummary } from './tools/get-day-summary.js';
import { handleClearDay } from './tools/clear-day.js';
import { handleResetEntries } from './tools/reset-entries.js';
import { handleExportData } from './tools/export-data.js';

const ACCOUNT_ERROR_STATUS: Record<AccountErrorCode, number> = {
  invalid_input: 400,
  invalid_credentials: 401,
  username_taken: 409,
  no_remembered_user: 404,
};

const CredentialsSchema = z.object({
  username: z.string(),
  password: z.string(),
});

const LoginSchema = CredentialsSchema.extend({
  remember: z.boolean().default(false),
});

const ResolveSchema = z.object({
  phrase: z.string().refine((phrase) => phrase.trim() !== '', {
    message: 'Phrase must not be blank',
  }),
});

const LogFoodsSchema = z.object({
  text: z.string(),
});

/** A date path segment: YYYY-MM-DD, or "today". */
const DateParamSchema = z.union([
  z.literal('today').transform(() => todayIso()),
  isoDateSchema,
]);

/** Path date plus the optional ?target= of the day routes. */
const DayRequestSchema = z.object({
  date: DateParamSchema,
  target: targetSchema.optional(),
});

type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

/** Validates a request value, describing the first problem on failure. */
function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): ParseResult<z.output<S>> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, error: `${where}${issue.message}` };
}

function statusOf(error: unknown): number {
  if (error instanceof AccountError) {
    return ACCOUNT_ERROR_STATUS[error.code];
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status;
  }
  return 500;
}

/** The logged-in user, or a 401 response when the token carries none. */
function requireUser(req: Request, res: Response): string | null {
  const username = usernameOf(req.auth);
  if (!username) {
    res.status(401).json({ error: 'A session token is required' });
  }
  return username;
}

function sendJsonRpcError(res: Response): void {
  if (!res.headersSent) {
    res.status(500).json({
      jsonrpc: '2.0',
      error: { code: -32603, message: 'Internal server error' },
      id: null,
    });
  }
}

export interface CalorieLogApp {
  app: express.Express;
  /** Closes every open MCP session. */
  closeSessions(): Promise<void>;
}

/** Builds the express app: account and day-log routes, plus the MCP endpoint. */
export function createApp(ctx: AppContext): CalorieLogApp {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json());

  const authMiddleware = requireBearerAuth({ verifier: ctx.sessions });

  // Track active transports by session ID for stateful MCP connections
  const transports = new Map<string, StreamableHTTPServerTransport>();

  /** Health check endpoint. */
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // -- Accounts --

  app.post('/api/auth/signup', (req, res) => {
    const input = parseInput(CredentialsSchema, req.body);
    if (!input.ok) {
      res.status(400).json({ error: input.error });
      return;
    }
    res.status(201).json(handleSignup(ctx, input.data));
  });

  app.post('/api/auth/login', (req, res) => {
    const input = parseInput(LoginSchema, req.body);
    if (!input.ok) {
      res.status(400).json({ error: input.error });
      return;
    }
    res.status(200).json(handleLogin(ctx, input.data));
  });

  app.post('/api/auth/resume', (_req, res) => {
    res.status(200).json(
      handleResume({ ...ctx, autoLoginEnabled: ctx.config.autoLoginEnabled }),
    );
  });

  app.post('/api/auth/logout', authMiddleware, (req, res) => {
    if (req.auth) {
      handleLogout(ctx, req.auth.token);
    }
    res.status(204).end();
  });

  // -- Resolver --

  app.post('/api/resolve', (req, res) => {
    const input = parseInput(ResolveSchema, req.body);
    if (!input.ok) {
      res.status(400).json({ error: input.error });
      return;
    }
    res.status(200).json(handleResolveFood(ctx, input.data));
  });

  // -- Day log --

  app.get('/api/days/:date', authMiddleware, (req, res) => {
    const username = requireUser(req, res);
    if (!username) return;
    const day = parseInput(DayRequestSchema, {
      date: req.params.date,
      target: req.query.target,
    });
    if (!day.ok) {
      res.status(400).json({ error: day.error });
      return;
    }
    res.status(200).json(handleGetDaySummary(ctx, { username, ...day.data }));
  });

  app.post('/api/days/:date/entries', authMiddleware, (req, res) => {
    const username = requireUser(req, res);
    if (!username) return;
    const day = parseInput(DayRequestSchema, {
      date: req.params.date,
      target: req.query.target,
    });
    if (!day.ok) {
      res.status(400).json({ error: day.error });
      return;
    }
    const body = parseInput(LogFoodsSchema, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    res
      .status(201)
      .json(handleLogFoods(ctx, { username, ...day.data, text: body.data.text }));
  });

  app.delete('/api/days/:date/entries', authMiddleware, (req, res) => {
    const username = requireUser(req, res);
    if (!username) return;
    const day = parseInput(DayRequestSchema, {
      date: req.params.date,
      target: req.query.target,
    });
    if (!day.ok) {
      res.status(400).json({ error: day.error });
      return;
    }
    res.status(200).json(handleClearDay(ctx, { username, ...day.data }));
  });

  app.delete('/api/entries', authMiddleware, (req, res) => {
    const username = requireUser(req, res);
    if (!username) return;
    res.status(200).json(handleResetEntries(ctx, { username }));
  });

  app.get('/api/export', authMiddleware, (req, res) => {
    const username = requireUser(req, res);
    if (!username) return;
    res.status(200).json(handleExportData(ctx, { username }));
  });

  // -- MCP --

  /**
   * MCP Streamable HTTP: POST handles initialization and all subsequent messages.
   * A new transport+server pair is created for each session on initialization.
   */
  app.post('/mcp', authMiddleware, async (req, res) => {
    const sessionId = req.header('mcp-session-id');
    const existing = sessionId ? transports.get(sessionId) : undefined;

    if (existing) {
      try {
        await existing.handleRequest(req, res, req.body);
      } catch (error) {
        console.error('Error handling MCP request:', error);
        sendJsonRpcError(res);
      }
      return;
    }

    if (sessionId) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    // No session ID: only initialization requests may create a new session
    if (!isInitializeRequest(req.body)) {
      res.status(400).json({ error: 'Bad Request: No valid session ID provided' });
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        transports.set(newSessionId, transport);
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    };

    const server = createMcpServer(ctx);
    await server.connect(transport);

    try {
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP initialization:', error);
      sendJsonRpcError(res);
    }
  });

  /** GET opens an SSE stream for server-initiated messages; DELETE ends the session. */
  const handleSessionRequest = async (req: Request, res: Response): Promise<void> => {
    const sessionId = req.header('mcp-session-id');
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).json({ error: 'Invalid or missing session ID' });
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      console.error(`Error handling MCP ${req.method} request:`, error);
      sendJsonRpcError(res);
    }
  };

  app.get('/mcp', authMiddleware, handleSessionRequest);
  app.delete('/mcp', authMiddleware, handleSessionRequest);

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status >= 500) {
      console.error('Unhandled request error:', error);
      res.status(500).json({ error: 'Internal server error' });
      return;
    }
    res
      .status(status)
      .json({ error: error instanceof Error ? error.message : 'Bad request' });
  });

  async function closeSessions(): Promise<void> {
    const closePromises = Array.from(transports.values()).map((transport) =>
      transport.close().catch((error: unknown) => {
        console.error('Error closing transport:', error);
      }),
    );
    await Promise.all(closePromises);
    transports.clear();
  }

  return { app, closeSessions };
}
