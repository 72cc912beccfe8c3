import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import { z } from 'zod';
import { EngineInvocationError, type ReasoningEngine, type ReasoningOutput, type ReasoningRequest } from './types.js';
import { Logger, type LoggerLike } from '../utils/logger.js';
import { expandPath } from '../utils/path.js';

const ENGINE_ENV_ALLOWLIST = [
  'HOME',
  'PATH',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TZ',
  'HTTPS_PROXY',
  'HTTP_PROXY',
  'NO_PROXY',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'DEEPSEEK_API_KEY',
] as const;

// sysexits.h EX_DATAERR: the engine rejected its input, so retrying cannot help.
const EXIT_DATA_ERROR = 65;

const PERMANENT_SPAWN_CODES = new Set(['ENOENT', 'EACCES', 'E2BIG']);

const engineOutputSchema = z.object({
  report: z.string(),
  artifact: z
    .object({
      name: z.string().min(1),
      content: z.string(),
    })
    .optional(),
});

const buildEngineEnv = (request: ReasoningRequest, cwd: string): NodeJS.ProcessEnv => {
  const base: NodeJS.ProcessEnv = {
    CODEWARDEN_TASK: request.taskId,
    CODEWARDEN_STAGE: request.stage,
    PWD: cwd,
  };

  for (const key of ENGINE_ENV_ALLOWLIST) {
    const value = process.env[key];
    if (typeof value === 'string' && value.length > 0) {
      base[key] = value;
    }
  }

  return base;
};

export const splitCommand = (command: string, args: string) => {
  const parsed = args && args.trim().length > 0
    ? args
        .trim()
        .match(/(?:"[^"]*"|[^\s"]+)/g)
        ?.map((value) => value.replace(/^"(.*)"$/, '$1')) ?? []
    : [];
  return [command, ...parsed];
};

class ProcessExitError extends Error {
  constructor(
    message: string,
    readonly code: number | null,
    readonly signal: NodeJS.Signals | null,
    readonly timedOut: boolean,
    readonly aborted: boolean,
    readonly stderr?: string,
  ) {
    super(message);
    this.name = 'ProcessExitError';
  }
}

const spawnErrorCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

interface ExecOptions {
  input: string;
  timeoutMs: number;
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

const runProcess = (cmd: string, args: string[], options: ExecOptions): Promise<string> =>
  new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    // A child may exit without reading its input; its exit status decides the outcome.
    child.stdin.on('error', (error) => {
      if (spawnErrorCode(error) !== 'EPIPE') {
        stderr += `stdin: ${error.message}`;
      }
    });
    child.stdin.end(options.input);

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, options.timeoutMs);

    const abortHandler = () => {
      aborted = true;
      child.kill('SIGTERM');
    };

    if (options.signal?.aborted) {
      abortHandler();
    } else {
      options.signal?.addEventListener('abort', abortHandler, { once: true });
    }

    child.on('error', (error) => {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', abortHandler);
      reject(error);
    });

    child.on('close', (code, signal) => {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', abortHandler);

      if (code === 0) {
        resolve(stdout);
        return;
      }

      const reason = timedOut ? 'timed out' : aborted ? 'was aborted' : `exited with ${code ?? signal}`;
      reject(new ProcessExitError(`engine command ${cmd} ${reason}`, code, signal, timedOut, aborted, stderr.trim() || undefined));
    });
  });

const toInvocationError = (error: unknown): EngineInvocationError => {
  if (error instanceof ProcessExitError) {
    const details = { code: error.code, signal: error.signal, timedOut: error.timedOut, stderr: error.stderr };
    const message = error.stderr ? `${error.message}: ${error.stderr}` : error.message;
    return new EngineInvocationError(message, error.code !== EXIT_DATA_ERROR, details);
  }

  const code = spawnErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return new EngineInvocationError(`engine command could not be started: ${message}`, !code || !PERMANENT_SPAWN_CODES.has(code), { code });
};

export const parseEngineOutput = (stdout: string): ReasoningOutput => {
  const output = stdout.trim();
  if (!output) {
    throw new EngineInvocationError('engine returned no output', true);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(output);
  } catch {
    return { report: output };
  }

  const parsed = engineOutputSchema.safeParse(decoded);
  return parsed.success ? parsed.data : { report: output };
};

/**
 * Runs one engine command per stage attempt. The request goes in as JSON on
 * stdin; stdout comes back as `{ report, artifact? }` JSON or plain text.
 */
export class ProcessEngine implements ReasoningEngine {
  private readonly cwd: string;

  constructor(
    private readonly command: string,
    private readonly args = '',
    private readonly timeoutMs = 120000,
    cwd = '',
    private readonly logger: LoggerLike = new Logger('engine.process'),
  ) {
    this.cwd = expandPath(cwd || process.cwd());
  }

  async invoke(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningOutput> {
    const payload = JSON.stringify({
      kind: 'review_stage',
      task: request.taskId,
      stage: request.stage,
      attempt: request.attempt,
      instructions: request.instructions,
      file: { name: request.fileName, content: request.content },
      prior: request.priorReports,
      expectArtifact: request.expectArtifact,
    });

    const [cmd, ...cmdArgs] = splitCommand(this.command, this.args);
    await fs.mkdir(this.cwd, { recursive: true });

    let stdout: string;
    try {
      stdout = await runProcess(cmd, cmdArgs, {
        input: payload,
        cwd: this.cwd,
        timeoutMs: this.timeoutMs,
        signal,
        env: buildEngineEnv(request, this.cwd),
      });
    } catch (error) {
      const failure = toInvocationError(error);
      this.logger.error('engine process invocation failed', {
        taskId: request.taskId,
        stage: request.stage,
        attempt: request.attempt,
        command: cmd,
        timeoutMs: this.timeoutMs,
        payloadBytes: Buffer.byteLength(payload, 'utf8'),
        retryable: failure.retryable,
        ...failure.details,
      });
      throw failure;
    }

    return parseEngineOutput(stdout);
  }

  async ping() {
    const [cmd, ...cmdArgs] = splitCommand(this.command, this.args);
    try {
      await fs.mkdir(this.cwd, { recursive: true });
      await runProcess(cmd, cmdArgs, {
        input: JSON.stringify({ kind: 'ping' }),
        cwd: this.cwd,
        timeoutMs: Math.min(this.timeoutMs, 10000),
        env: { PATH: process.env.PATH, HOME: process.env.HOME },
      });
      return true;
    } catch (error) {
      this.logger.warn('engine ping failed', { command: cmd, error: toInvocationError(error).message });
      return false;
    }
  }
}
