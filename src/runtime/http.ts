import http from 'node:http';
import type { AppConfig } from '../config.js';
import { ValidationError, errorMessage } from '../orchestration/errors.js';
import type { ReviewService } from '../orchestration/review-service.js';
import { isTaskStatus, isTerminalTaskStatus, type BroadcastMessage, type Task, type TaskListFilter, type TaskStatus } from '../orchestration/types.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';

const setSecurityHeaders = (res: http.ServerResponse) => {
  res.setHeader('content-type', 'application/json');
  res.setHeader('cache-control', 'no-store, no-cache, must-revalidate');
  res.setHeader('pragma', 'no-cache');
  res.setHeader('x-content-type-options', 'nosniff');
};

const writeJson = (res: http.ServerResponse, statusCode: number, body: unknown) => {
  setSecurityHeaders(res);
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
};

class RequestBodyError extends Error {
  constructor(readonly code: 'invalid_content_type' | 'invalid_json' | 'payload_too_large') {
    super(code);
    this.name = 'RequestBodyError';
  }
}

const readJsonBody = (req: http.IncomingMessage, maxBytes: number): Promise<unknown> => {
  return new Promise((resolve, reject) => {
    const contentType = req.headers['content-type'];
    if (!contentType || !contentType.includes('application/json')) {
      reject(new RequestBodyError('invalid_content_type'));
      req.resume();
      return;
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let rejected = false;
    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      received += chunk.length;
      if (received > maxBytes) {
        rejected = true;
        reject(new RequestBodyError('payload_too_large'));
        req.resume();
        return;
      }
      chunks.push(chunk);
    });

    req.on('error', (error) => {
      if (!rejected) reject(error);
    });

    req.on('end', () => {
      if (rejected) return;
      const body = Buffer.concat(chunks).toString('utf8');
      if (!body) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new RequestBodyError('invalid_json'));
      }
    });
  });
};

const requireAuth = (req: http.IncomingMessage, config: AppConfig, res: http.ServerResponse): boolean => {
  if (!config.CONTROL_AUTH_TOKEN) {
    return true;
  }

  if (req.headers['authorization'] !== `Bearer ${config.CONTROL_AUTH_TOKEN}`) {
    writeJson(res, 401, { error: 'unauthorized' });
    return false;
  }

  return true;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Drops file contents, which list responses never need. */
export const summarizeTask = (task: Task) => ({
  id: task.id,
  status: task.status,
  fileName: task.inputArtifact.name,
  bytes: task.inputArtifact.bytes,
  stages: task.stages.map(({ index, name, label, status, attempt }) => ({ index, name, label, status, attempt })),
  outputArtifact: task.outputArtifact
    ? { name: task.outputArtifact.name, path: task.outputArtifact.path, sha256: task.outputArtifact.sha256, bytes: task.outputArtifact.bytes }
    : undefined,
  createdAt: task.createdAt,
  updatedAt: task.updatedAt,
  finishedAt: task.finishedAt,
  error: task.error,
  revision: task.revision,
});

const parseNonNegativeInt = (raw: string | null): number | undefined | null => {
  if (raw === null || raw === '') return undefined;
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
};

const parseListFilter = (params: URLSearchParams): TaskListFilter | string => {
  const filter: TaskListFilter = {};

  const rawStatus = params.get('status');
  if (rawStatus) {
    const statuses: TaskStatus[] = [];
    for (const value of rawStatus.split(',').map((item) => item.trim()).filter(Boolean)) {
      if (!isTaskStatus(value)) return `unknown status ${value}`;
      statuses.push(value);
    }
    filter.status = statuses;
  }

  const limit = parseNonNegativeInt(params.get('limit'));
  if (limit === null) return 'limit must be a non-negative integer';
  const offset = parseNonNegativeInt(params.get('offset'));
  if (offset === null) return 'offset must be a non-negative integer';
  filter.limit = limit;
  filter.offset = offset;

  return filter;
};

const lastEventId = (req: http.IncomingMessage, params: URLSearchParams) => {
  const header = req.headers['last-event-id'];
  const raw = (Array.isArray(header) ? header[0] : header) ?? params.get('after') ?? '';
  return /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : undefined;
};

const sseFrame = (message: BroadcastMessage) => {
  if (message.type === 'subscriber_overflow') {
    return `event: overflow\ndata: ${JSON.stringify(message)}\n\n`;
  }
  return `id: ${message.revision}\ndata: ${JSON.stringify(message)}\n\n`;
};

type RouteAction = 'get' | 'start' | 'result' | 'events' | 'cancel';

const ROUTE_METHODS: Record<RouteAction, string> = {
  get: 'GET',
  start: 'POST',
  result: 'GET',
  events: 'GET',
  cancel: 'POST',
};

/** `null` for a segment that is not valid percent-encoding. */
const decodeTaskId = (raw: string): string | null => {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
};

const matchTaskRoute = (pathname: string): { id: string | null; action: RouteAction } | null => {
  const exact = pathname.match(/^\/tasks\/([^/]+)$/);
  if (exact) {
    return { id: decodeTaskId(exact[1]), action: 'get' };
  }

  const nested = pathname.match(/^\/tasks\/([^/]+)\/(start|result|events|cancel)$/);
  if (nested) {
    const action = nested[2];
    if (action === 'start' || action === 'result' || action === 'events' || action === 'cancel') {
      return { id: decodeTaskId(nested[1]), action };
    }
  }

  return null;
};

export interface EventSink {
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

const waitForDrain = (out: EventSink) =>
  new Promise<void>((resolve) => {
    const done = () => {
      out.off('drain', done);
      out.off('close', done);
      resolve();
    };
    out.once('drain', done);
    out.once('close', done);
  });

/**
 * Writes each message as an SSE frame. A full socket buffer pauses the loop
 * until `drain`, so a slow client backs up into its bounded subscriber queue.
 */
export const pumpEventStream = async (out: EventSink, events: AsyncIterable<BroadcastMessage>) => {
  for await (const message of events) {
    if (out.destroyed) return;
    if (!out.write(sseFrame(message)) && !out.destroyed) {
      await waitForDrain(out);
    }
  }
};

export const createHttpServer = (
  service: ReviewService,
  config: AppConfig,
  port: number,
  logger: LoggerLike = createLogger('runtime.http', config.LOG_LEVEL),
) => {
  const bodyLimit = config.MAX_FILE_BYTES * 2 + 64 * 1024;

  const streamEvents = async (req: http.IncomingMessage, res: http.ServerResponse, taskId: string, params: URLSearchParams) => {
    const subscription = service.subscribe(taskId, { afterRevision: lastEventId(req, params) });
    if (!subscription) {
      writeJson(res, 404, { error: 'task_not_found' });
      return;
    }

    res.on('close', () => subscription.close());
    res.writeHead(200, {
      'content-type': 'text/event-stream',
      'cache-control': 'no-cache',
      connection: 'keep-alive',
      'x-content-type-options': 'nosniff',
    });
    res.write(`event: snapshot\nid: ${subscription.snapshot.revision}\ndata: ${JSON.stringify(subscription.snapshot)}\n\n`);

    await pumpEventStream(res, subscription.events);
    res.end();
  };

  const createTask = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const body = await readJsonBody(req, bodyLimit);
    if (!isRecord(body) || typeof body.fileName !== 'string' || typeof body.content !== 'string') {
      writeJson(res, 400, { error: 'fileName and content are required strings' });
      return;
    }

    const created = await service.createTask({ name: body.fileName, content: body.content });
    if (body.start === true) {
      const outcome = service.startTask(created.id);
      writeJson(res, 201, { task: summarizeTask(service.getTask(created.id) ?? created), start: outcome });
      return;
    }
    writeJson(res, 201, { task: summarizeTask(created) });
  };

  const handleTaskRoute = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    route: { id: string; action: RouteAction },
    params: URLSearchParams,
  ) => {
    if (route.action === 'events') {
      await streamEvents(req, res, route.id, params);
      return;
    }

    if (route.action === 'cancel') {
      writeJson(res, 501, { error: 'cancellation_not_supported' });
      return;
    }

    if (route.action === 'start') {
      const outcome = service.startTask(route.id);
      if (outcome === 'not_found') {
        writeJson(res, 404, { error: 'task_not_found' });
      } else if (outcome === 'already_finished') {
        writeJson(res, 409, { error: 'task_already_finished', outcome });
      } else {
        writeJson(res, outcome === 'started' ? 202 : 200, { taskId: route.id, outcome });
      }
      return;
    }

    const task = service.getTask(route.id);
    if (!task) {
      writeJson(res, 404, { error: 'task_not_found' });
      return;
    }

    if (route.action === 'get') {
      writeJson(res, 200, { task });
      return;
    }

    const result = isTerminalTaskStatus(task.status) ? service.getResult(route.id) : null;
    if (!result) {
      writeJson(res, 409, { error: 'task_not_finished', status: task.status });
      return;
    }
    writeJson(res, 200, { result });
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    if (req.method !== 'GET' && req.method !== 'POST') {
      writeJson(res, 405, { error: 'Method Not Allowed' });
      return;
    }

    const url = new URL(req.url || '/', `http://127.0.0.1:${port || 80}`);
    const pathname = url.pathname;

    if (pathname === '/health') {
      if (req.method !== 'GET') {
        writeJson(res, 405, { error: 'Method Not Allowed' });
        return;
      }
      writeJson(res, 200, await service.health());
      return;
    }

    if (pathname === '/tasks') {
      if (!requireAuth(req, config, res)) return;
      if (req.method === 'POST') {
        await createTask(req, res);
        return;
      }
      const filter = parseListFilter(url.searchParams);
      if (typeof filter === 'string') {
        writeJson(res, 400, { error: filter });
        return;
      }
      writeJson(res, 200, { tasks: service.listTasks(filter).map(summarizeTask) });
      return;
    }

    const route = matchTaskRoute(pathname);
    if (route) {
      if (!requireAuth(req, config, res)) return;
      if (req.method !== ROUTE_METHODS[route.action]) {
        writeJson(res, 405, { error: 'Method Not Allowed' });
        return;
      }
      if (route.id === null) {
        writeJson(res, 400, { error: 'invalid_task_id' });
        return;
      }
      await handleTaskRoute(req, res, { id: route.id, action: route.action }, url.searchParams);
      return;
    }

    writeJson(res, 404, { error: 'Not Found' });
  };

  const server = http.createServer((req, res) => {
    void handle(req, res).catch((error: unknown) => {
      if (res.headersSent) {
        logger.warn('response aborted mid-stream', { url: req.url, error: errorMessage(error) });
        res.end();
        return;
      }

      if (error instanceof RequestBodyError) {
        writeJson(res, error.code === 'payload_too_large' ? 413 : 400, { error: error.code });
        return;
      }

      if (error instanceof ValidationError) {
        writeJson(res, error.code === 'file_too_large' ? 413 : 400, { error: error.message, code: error.code });
        return;
      }

      logger.error('request failed', { method: req.method, url: req.url, error: errorMessage(error) });
      writeJson(res, 500, { error: errorMessage(error) });
    });
  });

  return new Promise<http.Server>((resolve) => {
    server.listen(port, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      logger.info(`HTTP control listening on ${boundPort}`);
      resolve(server);
    });
  });
};
