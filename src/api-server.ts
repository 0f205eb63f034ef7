import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import * as jose from 'jose';
import { createChildLogger } from './logger.js';
import { errorMessage } from './errors.js';
import type { KillResult } from './safety/kill-switch.js';
import type { RestartDecision } from './supervisor/restart-guard.js';
import type { HealthReport, Position, StatusSnapshot } from './types/index.js';

const log = createChildLogger('api-server');

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** What the administrative commands act on (the Supervisor in production). */
export interface CommandTarget {
  kill(reason: string): Promise<KillResult>;
  stop(reason: string): Promise<void>;
  requestRestart(reason: string): Promise<RestartDecision>;
  status(): StatusSnapshot;
  runHealthCheck(): Promise<HealthReport>;
  performance(): Promise<string>;
  openPositions(): Promise<Position[]>;
}

export const COMMANDS = ['kill', 'stop', 'restart', 'status', 'health', 'performance', 'positions'] as const;
export type CommandName = (typeof COMMANDS)[number];

const jsonHeaders: Record<string, string> = { 'Content-Type': 'application/json' };
const COMMAND_PATH = /^\/api\/commands\/([a-z]+)\/?$/;

function isCommand(name: string): name is CommandName {
  return (COMMANDS as readonly string[]).includes(name);
}

function send(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, jsonHeaders);
  res.end(JSON.stringify(body));
}

function bearerToken(req: IncomingMessage): string | null {
  const header = req.headers.authorization;
  if (!header) return null;
  const m = /^Bearer\s+(\S+)$/i.exec(header);
  return m?.[1] ?? null;
}

/**
 * `POST /api/commands/<name>` with an HS256 bearer token carrying
 * `role: "admin"`.
 */
export function createCommandHandler(target: CommandTarget, jwtSecret: string): ApiHandler {
  const key = new TextEncoder().encode(jwtSecret);

  return async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = (req.url ?? '').split('?')[0] ?? '';
    const match = COMMAND_PATH.exec(url);
    if (!match) {
      send(res, 404, { error: 'Not found' });
      return;
    }
    if (req.method !== 'POST') {
      send(res, 405, { error: 'Method not allowed' });
      return;
    }

    const token = bearerToken(req);
    if (!token) {
      send(res, 401, { error: 'Missing bearer token' });
      return;
    }
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, key, { algorithms: ['HS256'] }));
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Rejected admin token');
      send(res, 401, { error: 'Invalid token' });
      return;
    }
    if (payload['role'] !== 'admin') {
      send(res, 403, { error: 'Admin role required' });
      return;
    }

    const name = match[1] ?? '';
    if (!isCommand(name)) {
      send(res, 404, { error: `Unknown command: ${name}` });
      return;
    }

    log.warn({ command: name, sub: payload.sub }, 'Admin command');
    try {
      await run(target, name, res);
    } catch (err) {
      log.error({ err, command: name }, 'Admin command failed');
      send(res, 500, { error: errorMessage(err) });
    }
  };
}

async function run(target: CommandTarget, name: CommandName, res: ServerResponse): Promise<void> {
  switch (name) {
    case 'kill':
      send(res, 200, await target.kill('admin command'));
      return;
    case 'stop':
      // the process halts once positions are closed, so answer first
      send(res, 202, { accepted: true });
      target.stop('admin command').catch((err: unknown) => log.error({ err }, 'Stop failed'));
      return;
    case 'restart':
      send(res, 202, { accepted: true });
      target
        .requestRestart('admin command')
        .then((decision) => log.info({ decision }, 'Restart request handled'))
        .catch((err: unknown) => log.error({ err }, 'Restart failed'));
      return;
    case 'status':
      send(res, 200, target.status());
      return;
    case 'health':
      send(res, 200, await target.runHealthCheck());
      return;
    case 'performance':
      send(res, 200, { report: await target.performance() });
      return;
    case 'positions':
      send(res, 200, { positions: await target.openPositions() });
      return;
  }
}

/** Null when no secret is configured (commands disabled). */
export function startCommandServer(target: CommandTarget, options: { port: number; jwtSecret: string }): Server | null {
  if (!options.jwtSecret) {
    log.warn('ADMIN_JWT_SECRET not set, admin command server disabled');
    return null;
  }
  const server = createServer(createCommandHandler(target, options.jwtSecret));
  server.listen(options.port, () => {
    log.info({ port: options.port }, 'Admin command server listening');
  });
  return server;
}
