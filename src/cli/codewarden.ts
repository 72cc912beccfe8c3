#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import { config } from '../config.js';
import { createReviewService } from '../orchestration/review-service.js';
import type { BroadcastMessage } from '../orchestration/types.js';
import { createLogger } from '../utils/logger.js';
import { parseSseFrames } from './sse.js';

const baseUrl = process.env.CODEWARDEN_URL || `http://127.0.0.1:${config.CONTROL_HTTP_PORT || 8787}`;

class CliError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'CliError';
    this.hint = hint;
  }
}

class HttpError extends CliError {
  readonly status: number;
  readonly payload: unknown;

  constructor(status: number, route: string, payload: unknown, hint?: string) {
    super(`HTTP ${status} ${route}: ${JSON.stringify(payload)}`, hint);
    this.name = 'HttpError';
    this.status = status;
    this.payload = payload;
  }
}

const fail = (message: string, hint?: string): never => {
  throw new CliError(message, hint);
};

const json = (value: unknown) => process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);

const parseArgs = (argv: string[]) => {
  const args = argv.slice(2);
  const command = args[0] || 'help';
  return { command, args: args.slice(1) };
};

const getFlag = (args: string[], name: string, fallback = '') => {
  const prefixed = `--${name}=`;
  const direct = args.find((arg) => arg.startsWith(prefixed));
  if (direct) return direct.slice(prefixed.length);

  const index = args.findIndex((arg) => arg === `--${name}`);
  if (index >= 0 && args[index + 1]) {
    return args[index + 1];
  }

  return fallback;
};

const hasFlag = (args: string[], name: string) => args.includes(name);

const positional = (args: string[]) => args.find((arg) => !arg.startsWith('--'));

const httpHint = (status: number) => {
  if (status === 401) {
    return 'CONTROL_AUTH_TOKEN does not match the running service. Check the .env file the CLI reads.';
  }
  if (status === 404) {
    return 'The task or route was not found. List tasks with `codewarden tasks`.';
  }
  if (status === 409) {
    return 'The task is not in a state that allows this. Inspect it with `codewarden task <id>`.';
  }
  if (status >= 500) {
    return 'The service reported an internal error. Inspect its logs.';
  }
  return undefined;
};

const authHeaders = (): Record<string, string> =>
  config.CONTROL_AUTH_TOKEN ? { authorization: `Bearer ${config.CONTROL_AUTH_TOKEN}` } : {};

const send = async (method: 'GET' | 'POST', route: string, headers: Record<string, string>, body?: string) => {
  try {
    return await fetch(`${baseUrl}${route}`, { method, headers: { ...authHeaders(), ...headers }, body });
  } catch (error) {
    throw new CliError(
      `unable to reach codewarden at ${baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
      'Start the service (`npm start`) and verify CONTROL_HTTP_PORT or CODEWARDEN_URL.',
    );
  }
};

const request = async (method: 'GET' | 'POST', route: string, body?: unknown) => {
  const headers: Record<string, string> = { accept: 'application/json' };
  if (body) {
    headers['content-type'] = 'application/json';
  }

  const res = await send(method, route, headers, body ? JSON.stringify(body) : undefined);
  const raw = await res.text();
  let payload: unknown;
  try {
    payload = raw ? JSON.parse(raw) : {};
  } catch {
    payload = { raw };
  }

  if (!res.ok) {
    throw new HttpError(res.status, route, payload, httpHint(res.status));
  }
  return payload;
};

const describeMessage = (message: BroadcastMessage) => {
  if (message.type === 'subscriber_overflow') {
    return `[overflow] fell behind after revision ${message.lastQueuedRevision ?? 'none'}; re-run watch to resume`;
  }

  const stage = message.stageName ? ` ${message.stageName}` : '';
  const attempt = message.attempt ? ` attempt=${message.attempt}` : '';
  const error = message.error ? ` error=${message.error}` : '';
  return `[${message.type}]${stage}${attempt}${error}`;
};

const isBroadcastMessage = (value: unknown): value is BroadcastMessage =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  typeof value.type === 'string' &&
  'taskId' in value &&
  typeof value.taskId === 'string';

const readSource = async (file: string) => {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    return fail(`unable to read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

const runLocalReview = async (file: string, asJson: boolean) => {
  const service = createReviewService(config, { logger: createLogger('codewarden', config.LOG_LEVEL === 'debug' ? 'debug' : 'warn') });
  const task = await service.createTask({ name: path.basename(file), content: await readSource(file) });
  const subscription = service.subscribe(task.id);
  if (!subscription) {
    return fail(`task ${task.id} vanished before it started`);
  }

  service.startTask(task.id);
  for await (const message of subscription.events) {
    if (!asJson) process.stderr.write(`${describeMessage(message)}\n`);
  }
  await service.settled(task.id);

  const result = service.getResult(task.id);
  if (!result) {
    return fail(`task ${task.id} did not finish`);
  }

  if (asJson) {
    json(result);
  } else {
    process.stdout.write(result.report);
    if (result.artifact?.path) {
      process.stdout.write(`\nfixed file: ${result.artifact.path}\n`);
    }
  }

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
};

const watchTask = async (taskId: string) => {
  const res = await send('GET', `/tasks/${encodeURIComponent(taskId)}/events`, { accept: 'text/event-stream' });
  if (!res.ok || !res.body) {
    const raw = await res.text();
    throw new HttpError(res.status, `/tasks/${taskId}/events`, raw, httpHint(res.status));
  }

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    buffer += decoder.decode(value, { stream: true });
    const parsed = parseSseFrames(buffer);
    buffer = parsed.rest;
    for (const frame of parsed.frames) {
      if (frame.event === 'snapshot') {
        const snapshot: unknown = JSON.parse(frame.data);
        const status = typeof snapshot === 'object' && snapshot !== null && 'status' in snapshot ? String(snapshot.status) : 'unknown';
        process.stdout.write(`[snapshot] status=${status} revision=${frame.id ?? '?'}\n`);
        continue;
      }
      const message: unknown = JSON.parse(frame.data);
      if (isBroadcastMessage(message)) {
        process.stdout.write(`${describeMessage(message)}\n`);
      }
    }
  }
};

const help = () => {
  process.stdout.write('codewarden CLI\n\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  review <file> [--json]          run the review pipeline in-process\n');
  process.stdout.write('  submit <file> [--no-start]      submit a file to the running service\n');
  process.stdout.write('  task <id> [--result]            show a task, or its result once finished\n');
  process.stdout.write('  tasks [--status s] [--limit n]  list tasks\n');
  process.stdout.write('  watch <id>                      stream task events\n\n');
  process.stdout.write('Examples:\n');
  process.stdout.write('  codewarden review src/app.py\n');
  process.stdout.write('  codewarden tasks --status running,failed --limit 10\n');
};

const main = async () => {
  const { command, args } = parseArgs(process.argv);

  if (command === 'review') {
    const file = positional(args) ?? fail('review requires a file', 'Example: codewarden review src/app.py');
    await runLocalReview(file, hasFlag(args, '--json'));
    return;
  }

  if (command === 'submit') {
    const file = positional(args) ?? fail('submit requires a file', 'Example: codewarden submit src/app.py');
    json(
      await request('POST', '/tasks', {
        fileName: path.basename(file),
        content: await readSource(file),
        start: !hasFlag(args, '--no-start'),
      }),
    );
    return;
  }

  if (command === 'task') {
    const id = positional(args) ?? fail('task requires an id', 'Example: codewarden task task-1234');
    const route = `/tasks/${encodeURIComponent(id)}`;
    json(await request('GET', hasFlag(args, '--result') ? `${route}/result` : route));
    return;
  }

  if (command === 'tasks') {
    const params = new URLSearchParams();
    const status = getFlag(args, 'status');
    const limit = getFlag(args, 'limit');
    const offset = getFlag(args, 'offset');
    if (status) params.set('status', status);
    if (limit) params.set('limit', limit);
    if (offset) params.set('offset', offset);
    const query = params.toString();
    json(await request('GET', query ? `/tasks?${query}` : '/tasks'));
    return;
  }

  if (command === 'watch') {
    const id = positional(args) ?? fail('watch requires an id', 'Example: codewarden watch task-1234');
    await watchTask(id);
    return;
  }

  if (command === 'help' || command === '--help' || command === '-h') {
    help();
    return;
  }

  fail(`unknown command: ${command}`, 'Use `codewarden --help` to list commands.');
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`codewarden cli error: ${message}\n`);
  if (error instanceof CliError && error.hint) {
    process.stderr.write(`codewarden cli hint: ${error.hint}\n`);
  }
  process.exit(1);
});
