import { Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from '../common/error-message';
import { SessionError } from './session.errors';

const sessionRecordSchema = z.object({
  user_id: z.string().min(1),
  created_at: z.string(),
  expires_at: z.number().int(),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

/** Token -> record, loaded fresh for every operation. */
export type SessionMap = Map<string, SessionRecord>;

export interface StoreMutation<T> {
  value: T;
  /** Only changed maps are written back. */
  changed: boolean;
}

/**
 * JSON file of `{ [token]: { user_id, created_at, expires_at } }`. A missing or
 * unreadable file is an empty store. Writes go to a temp file that is renamed
 * over the original, and every load-modify-save cycle runs one at a time.
 */
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name);
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async load(): Promise<SessionMap> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return new Map();
      }
      this.logger.warn(`Session file ${this.filePath} unreadable, starting empty: ${errorMessage(error)}`);
      return new Map();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.warn(`Session file ${this.filePath} is corrupted, starting empty: ${errorMessage(error)}`);
      return new Map();
    }

    const parsed = z.record(z.unknown()).safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Session file ${this.filePath} is not an object, starting empty`);
      return new Map();
    }

    const sessions: SessionMap = new Map();
    let dropped = 0;
    for (const [token, value] of Object.entries(parsed.data)) {
      const record = sessionRecordSchema.safeParse(value);
      if (record.success) {
        sessions.set(token, record.data);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} malformed session entries from ${this.filePath}`);
    }
    return sessions;
  }

  async save(sessions: SessionMap): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(Object.fromEntries(sessions), null, 2), 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      throw new SessionError(`Failed to persist sessions to ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  /** Load, mutate and save as one step, ordered after every earlier update. */
  update<T>(mutate: (sessions: SessionMap) => StoreMutation<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const sessions = await this.load();
      const { value, changed } = mutate(sessions);
      if (changed) {
        await this.save(sessions);
      }
      return value;
    });
    // A failed update still releases the queue; the caller receives the error from `run`
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
