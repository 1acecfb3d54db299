// /src/lib/session-store.ts

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { SessionError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { sessionSchema } from '@/lib/schemas';
import type { Session, User } from '@/types/tasks';

const log = createLogger('session-store');

/**
 * Read side of the persisted session. The HTTP client only ever needs this
 * much: it attaches the token, it never interprets it.
 */
export interface SessionReader {
  getCurrentUser(): Promise<User | undefined>;
  getToken(): Promise<string | undefined>;
}

export interface SessionStore extends SessionReader {
  save(session: Session): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Keeps the token and user as a single JSON file. A missing file is an
 * empty session; a file that does not parse is an error.
 */
export class FileSessionStore implements SessionStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  private async read(): Promise<Session | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err: unknown) {
      if (isNotFound(err)) return undefined;
      throw new SessionError(`Cannot read session file ${this.filePath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err: unknown) {
      throw new SessionError(`Session file ${this.filePath} is not valid JSON`, { cause: err });
    }

    const parsed = sessionSchema.safeParse(json);
    if (!parsed.success) {
      throw new SessionError(`Session file ${this.filePath} has an unexpected shape`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getToken(): Promise<string | undefined> {
    return (await this.read())?.token;
  }

  async getCurrentUser(): Promise<User | undefined> {
    return (await this.read())?.user;
  }

  async save(session: Session): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(session, null, 2), { mode: 0o600 });
    log.debug({ userId: session.user.id }, 'session saved');
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
    log.debug('session cleared');
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
