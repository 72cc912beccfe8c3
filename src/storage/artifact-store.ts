import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ensureDir, expandPath, joinSafe, sanitizeSegment } from '../utils/path.js';

const RETRYABLE_IO_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE']);

export interface StoredArtifact {
  path: string;
  sha256: string;
  bytes: number;
}

export interface ArtifactStore {
  putUploaded(taskId: string, name: string, content: string): Promise<string>;
  getUploaded(taskId: string): Promise<string | null>;
  putDerived(name: string, content: string): Promise<StoredArtifact>;
}

export class ArtifactStoreError extends Error {
  constructor(message: string, readonly retryable: boolean, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArtifactStoreError';
  }
}

const ioCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

const wrapIoError = (action: string, error: unknown) => {
  const code = ioCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return new ArtifactStoreError(`${action} failed: ${message}`, code !== undefined && RETRYABLE_IO_CODES.has(code), code, {
    cause: error,
  });
};

export const sha256Hex = (content: string) => createHash('sha256').update(content, 'utf8').digest('hex');

/**
 * Uploads live at `<uploadDir>/<taskId>/<name>`; derived artifacts at
 * `<fixedDir>/<name>` with a `<name>.meta.json` sidecar. Path segments are
 * sanitized, so names can never escape either root.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly uploadDir: string;
  private readonly fixedDir: string;

  constructor(uploadDir: string, fixedDir: string, private readonly now: () => Date = () => new Date()) {
    this.uploadDir = path.resolve(expandPath(uploadDir));
    this.fixedDir = path.resolve(expandPath(fixedDir));
  }

  async putUploaded(taskId: string, name: string, content: string) {
    const dir = path.join(this.uploadDir, sanitizeSegment(taskId));
    const target = path.join(dir, sanitizeSegment(name));
    try {
      await ensureDir(dir);
      await fs.writeFile(target, content, 'utf8');
    } catch (error) {
      throw wrapIoError(`storing upload for ${taskId}`, error);
    }
    return target;
  }

  async getUploaded(taskId: string) {
    const dir = path.join(this.uploadDir, sanitizeSegment(taskId));
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error) {
      if (ioCode(error) === 'ENOENT') return null;
      throw wrapIoError(`listing upload for ${taskId}`, error);
    }

    const [first] = entries.sort();
    if (!first) return null;

    try {
      return await fs.readFile(path.join(dir, first), 'utf8');
    } catch (error) {
      throw wrapIoError(`reading upload for ${taskId}`, error);
    }
  }

  async putDerived(name: string, content: string): Promise<StoredArtifact> {
    const segments = name.split('/').filter(Boolean);
    if (segments.length === 0) {
      throw new ArtifactStoreError('derived artifact needs a name', false);
    }

    const target = path.join(this.fixedDir, joinSafe(...segments));
    const sha256 = sha256Hex(content);
    const bytes = Buffer.byteLength(content, 'utf8');
    const meta = {
      name: path.basename(target),
      sha256,
      bytes,
      createdAt: this.now().toISOString(),
    };

    try {
      await ensureDir(path.dirname(target));
      await fs.writeFile(target, content, 'utf8');
      await fs.writeFile(`${target}.meta.json`, `${JSON.stringify(meta, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw wrapIoError(`storing derived artifact ${name}`, error);
    }

    return { path: target, sha256, bytes };
  }
}
