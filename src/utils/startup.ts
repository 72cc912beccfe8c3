import fs from 'node:fs';
import { execFileSync } from 'node:child_process';
import type { AppConfig } from '../config.js';
import { expandPath } from './path.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export class StartupValidationError extends Error {
  constructor(readonly issues: StartupIssue[]) {
    super(`Startup validation failed:\n${issues.map((entry) => `- [${entry.area}] ${formatStartupIssue(entry)}`).join('\n')}`);
    this.name = 'StartupValidationError';
  }
}

const ensureDirWritable = (targetPath: string): string | null => {
  try {
    fs.mkdirSync(targetPath, { recursive: true });
    fs.accessSync(targetPath, fs.constants.F_OK | fs.constants.R_OK | fs.constants.W_OK);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

const commandExists = (command: string): boolean => {
  if (!command.trim()) {
    return false;
  }

  if (command.includes('/')) {
    return fs.existsSync(command);
  }

  try {
    execFileSync('sh', ['-lc', `command -v ${JSON.stringify(command)}`], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
};

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

const STORAGE_DIRS = [
  { key: 'DATA_DIR', code: 'data_dir_not_writable' },
  { key: 'UPLOAD_DIR', code: 'upload_dir_not_writable' },
  { key: 'FIXED_DIR', code: 'fixed_dir_not_writable' },
] as const;

export const validateStartupConfig = (config: AppConfig): StartupIssue[] => {
  const issues: StartupIssue[] = [];

  if (!config.CONTROL_AUTH_TOKEN) {
    issues.push({
      severity: 'warn',
      area: 'control-plane',
      message: 'CONTROL_AUTH_TOKEN is empty; task endpoints are unauthenticated.',
      remediation: 'Set CONTROL_AUTH_TOKEN in .env to a long random value (recommended: >=24 chars), then restart codewarden.',
      code: 'missing_control_auth_token',
    });
  } else if (config.CONTROL_AUTH_TOKEN.length < 24) {
    issues.push({
      severity: 'warn',
      area: 'control-plane',
      message: 'CONTROL_AUTH_TOKEN is short; use at least 24 characters.',
      remediation: 'Regenerate CONTROL_AUTH_TOKEN with a longer value and restart codewarden.',
      code: 'weak_control_auth_token',
    });
  }

  if (config.ENGINE_MODE === 'process' && !config.ENGINE_COMMAND.trim()) {
    issues.push({
      severity: 'error',
      area: 'engine',
      message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
      remediation: 'Set ENGINE_COMMAND to an installed executable or switch ENGINE_MODE=mock for local smoke testing.',
      code: 'missing_engine_command',
    });
  } else if (config.ENGINE_MODE === 'process' && !commandExists(config.ENGINE_COMMAND)) {
    issues.push({
      severity: 'error',
      area: 'engine',
      message: `ENGINE_COMMAND "${config.ENGINE_COMMAND}" is not executable or not on PATH.`,
      remediation: 'Install the command, use an absolute ENGINE_COMMAND path, or switch ENGINE_MODE=mock.',
      code: 'engine_command_not_found',
    });
  }

  if (config.ENGINE_MODE === 'mock' && config.NODE_ENV === 'production') {
    issues.push({
      severity: 'warn',
      area: 'engine',
      message: 'ENGINE_MODE=mock returns canned reviews.',
      remediation: 'Set ENGINE_MODE=process with an ENGINE_COMMAND for real reviews.',
      code: 'mock_engine_in_production',
    });
  }

  if (config.STAGE_RETRY_BASE_MS * 2 ** Math.max(0, config.STAGE_MAX_RETRIES - 1) > config.STAGE_TIMEOUT_MS) {
    issues.push({
      severity: 'warn',
      area: 'orchestration',
      message: 'Retry backoff can outgrow STAGE_TIMEOUT_MS; failed stages may wait longer than they run.',
      remediation: 'Lower STAGE_RETRY_BASE_MS or STAGE_MAX_RETRIES, or raise STAGE_TIMEOUT_MS.',
      code: 'backoff_exceeds_timeout',
    });
  }

  for (const { key, code } of STORAGE_DIRS) {
    const dir = expandPath(config[key]);
    const dirErr = ensureDirWritable(dir);
    if (dirErr) {
      issues.push({
        severity: 'error',
        area: 'storage',
        message: `${key} is not writable (${dir}): ${dirErr}`,
        remediation: `Create and chown the directory for the codewarden user: mkdir -p "${dir}" && chown -R $(id -un):$(id -gn) "${dir}"`,
        code,
      });
    }
  }

  if (config.ENGINE_MODE === 'process') {
    const engineDir = expandPath(config.ENGINE_CWD);
    const engineDirErr = ensureDirWritable(engineDir);
    if (engineDirErr) {
      issues.push({
        severity: 'error',
        area: 'engine',
        message: `ENGINE_CWD is not writable (${engineDir}): ${engineDirErr}`,
        remediation: `Create and chown engine cwd: mkdir -p "${engineDir}" && chown -R $(id -un):$(id -gn) "${engineDir}"`,
        code: 'engine_cwd_not_writable',
      });
    }
  }

  return issues;
};

/** Returns the warnings; throws when any issue is an error. */
export const validateStartupConfigOrThrow = (config: AppConfig): StartupIssue[] => {
  const issues = validateStartupConfig(config);
  const errors = issues.filter((entry) => entry.severity === 'error');
  if (errors.length > 0) {
    throw new StartupValidationError(errors);
  }
  return issues;
};
