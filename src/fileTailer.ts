import fs from 'fs';
import { EventEmitter } from 'events';
import { StringDecoder } from 'string_decoder';
import { setTimeout as sleep } from 'timers/promises';

export type LineHandler = (line: string) => Promise<unknown> | void;

export interface FileTailerOptions {
  /** Idle wait once caught up with the file. */
  pollIntervalMs?: number;
  /** Wait before retrying a file that does not exist yet. */
  reopenDelayMs?: number;
  chunkSize?: number;
}

export interface TailerStatus {
  path: string;
  open: boolean;
  position: number;
}

export interface FileTailer {
  on(event: 'notice', listener: (msg: string) => void): this;
  emit(event: 'notice', msg: string): boolean;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Follows a log file from its end, one complete line at a time. Rotation
 * (new inode under the same path) reopens the file at its end; truncation
 * rewinds to the start.
 */
export class FileTailer extends (EventEmitter as { new(): EventEmitter }) {
  private handle?: fs.promises.FileHandle;
  private inode?: number;
  private position = 0;
  private partial = '';
  private pending: string[] = [];
  private decoder = new StringDecoder('utf8');
  private readonly buffer: Buffer;
  private readonly pollIntervalMs: number;
  private readonly reopenDelayMs: number;

  constructor(readonly path: string, private onLine: LineHandler, options: FileTailerOptions = {}) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? 200;
    this.reopenDelayMs = options.reopenDelayMs ?? 1000;
    this.buffer = Buffer.allocUnsafe(options.chunkSize ?? 64 * 1024);
  }

  /** Runs until `signal` aborts. Lines are handed over strictly one after another. */
  async run(signal?: AbortSignal): Promise<void> {
    try {
      while (!signal?.aborted) {
        if (!this.handle) {
          if (!(await this.open())) await this.pause(this.reopenDelayMs, signal);
          continue;
        }

        const line = await this.nextLine();
        if (line !== undefined) {
          await this.onLine(line);
          continue;
        }

        const state = await this.checkFile();
        if (state === 'reopen' || state === 'drain') continue;
        await this.pause(this.pollIntervalMs, signal);
      }
    } finally {
      await this.close();
    }
  }

  status(): TailerStatus {
    return { path: this.path, open: this.handle !== undefined, position: this.position };
  }

  private async open(): Promise<boolean> {
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(this.path, 'r');
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
    const stat = await handle.stat();
    this.handle = handle;
    this.inode = stat.ino;
    this.position = stat.size;
    this.resetBuffers();
    this.emit('notice', `Tailing log file ${this.path}`);
    return true;
  }

  private async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    this.inode = undefined;
    this.resetBuffers();
    if (handle) await handle.close();
  }

  private resetBuffers(): void {
    this.partial = '';
    this.pending = [];
    this.decoder = new StringDecoder('utf8');
  }

  private async nextLine(): Promise<string | undefined> {
    const handle = this.handle;
    while (handle && this.pending.length === 0) {
      const { bytesRead } = await handle.read(this.buffer, 0, this.buffer.length, this.position);
      if (bytesRead <= 0) break;
      this.position += bytesRead;
      const parts = (this.partial + this.decoder.write(this.buffer.subarray(0, bytesRead))).split('\n');
      // Last piece has no newline yet; hold it until the writer finishes it.
      this.partial = parts.pop() ?? '';
      this.pending.push(...parts);
    }
    return this.pending.shift();
  }

  private async checkFile(): Promise<'reopen' | 'drain' | 'closed' | 'idle'> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(this.path);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      await this.close();
      return 'closed';
    }
    if (stat.ino !== this.inode) {
      // Lines written to the old file just before it was moved come first.
      if (this.handle && (await this.handle.stat()).size > this.position) return 'drain';
      this.emit('notice', 'Log rotation detected; reopening file');
      await this.close();
      return 'reopen';
    }
    if (this.position > stat.size) {
      this.emit('notice', 'Log truncation detected; reading from start');
      this.position = 0;
      this.resetBuffers();
    }
    return 'idle';
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }
}
