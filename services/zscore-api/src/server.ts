import { ErrorResponse } from '@zscore/schemas';
import { randomUUID } from 'crypto';
import http, { type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { Logger } from 'pino';
import { z } from 'zod';
import { InvalidRequest, ZScoreError, describeIssues } from './errors';
import { createMetrics } from './metrics';
import type { ZScoreService } from './service';
import { ToolRegistry, type ToolContext, registerZScoreTools } from './tools';

export interface ServerDeps {
  service: ZScoreService;
  logger: Logger;
  version?: string;
}

const CallInput = z.object({ tool: z.string().min(1), input: z.unknown() });
const ZSCORE_PATH = /^\/zscore\/([^/]+)\/?$/;

function send(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'content-type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  const text = Buffer.concat(chunks).toString('utf8');
  if (!text.trim()) throw new InvalidRequest('request body is required');
  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidRequest('request body is not valid JSON');
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidRequest('company path segment is not valid URL encoding');
  }
}

function errorBody(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof ZScoreError) return { status: err.status, body: err.toResponse() };
  if (err instanceof z.ZodError) return { status: 500, body: { error: 'internal_error', message: describeIssues(err), retryable: false } };
  const message = err instanceof Error ? err.message : String(err);
  return { status: 500, body: { error: 'internal_error', message, retryable: false } };
}

export function createServer(deps: ServerDeps): Server {
  const log = deps.logger;
  const version = deps.version ?? '1.0.0';
  const metrics = createMetrics();
  const tools = new ToolRegistry(log);
  registerZScoreTools(tools, deps.service);

  const evaluate = async (company: unknown, ctx: ToolContext): Promise<unknown> => {
    const end = metrics.evaluation.startTimer();
    try {
      return await tools.invoke('zscore.evaluate', { company }, ctx);
    } finally {
      end();
    }
  };

  return http.createServer(async (req, res) => {
    const method = req.method ?? 'UNKNOWN';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const headerId = req.headers['x-correlation-id'];
    const reqId = typeof headerId === 'string' && headerId ? headerId : randomUUID();
    const ctx: ToolContext = { log: log.child({ reqId }) };
    const idHeader = { 'x-correlation-id': reqId };
    let route = 'unknown';

    const reply = (status: number, body: unknown, headers: Record<string, string> = {}) => {
      send(res, status, body, { ...idHeader, ...headers });
      metrics.requests.inc({ method, path: route, status: String(status) });
    };

    try {
      if (method === 'GET' && path === '/') {
        route = '/';
        reply(200, { message: 'Altman Z-Score API', version });
        return;
      }
      if (method === 'GET' && path === '/health') {
        route = '/health';
        reply(200, { status: 'ok' });
        return;
      }
      if (method === 'GET' && path === '/metrics') {
        route = '/metrics';
        const body = await metrics.registry.metrics();
        res.writeHead(200, { 'content-type': metrics.registry.contentType, ...idHeader });
        res.end(body);
        metrics.requests.inc({ method, path: route, status: '200' });
        return;
      }
      const match = ZSCORE_PATH.exec(path);
      if (method === 'GET' && match) {
        route = '/zscore/:company';
        reply(200, await evaluate(decodeSegment(match[1]), ctx));
        return;
      }
      if (method === 'POST' && (path === '/zscore' || path === '/zscore/')) {
        route = '/zscore';
        const body = await readJson(req);
        const company = typeof body === 'object' && body !== null && 'company' in body ? body.company : undefined;
        reply(200, await evaluate(company, ctx));
        return;
      }
      if (method === 'POST' && path === '/call') {
        route = '/call';
        const parsed = CallInput.safeParse(await readJson(req));
        if (!parsed.success) throw new InvalidRequest(describeIssues(parsed.error));
        if (!tools.has(parsed.data.tool)) {
          reply(404, { error: 'tool_not_found', message: `Unknown tool '${parsed.data.tool}'`, retryable: false });
          return;
        }
        reply(200, await tools.invoke(parsed.data.tool, parsed.data.input, ctx));
        return;
      }
      reply(404, { error: 'not_found', message: `No route for ${method} ${path}`, retryable: false });
    } catch (err) {
      const { status, body } = errorBody(err);
      metrics.errors.inc({ code: body.error });
      if (status >= 500 && !(err instanceof ZScoreError)) {
        ctx.log.error({ err }, 'unhandled error');
      } else {
        ctx.log.warn({ code: body.error, status }, body.message);
      }
      reply(status, body);
    }
  });
}
