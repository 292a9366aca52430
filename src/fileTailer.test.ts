import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FileTailer } from './fileTailer';

function nextNotice(tailer: FileTailer, prefix: string): Promise<string> {
  return new Promise((resolve) => {
    const listener = (msg: string) => {
      if (msg.startsWith(prefix)) {
        tailer.removeListener('notice', listener);
        resolve(msg);
      }
    };
    tailer.on('notice', listener);
  });
}

describe('FileTailer', () => {
  let dir: string;
  let file: string;
  let lines: string[];
  let tailer: FileTailer;
  let controller: AbortController;
  let running: Promise<void> | undefined;

  function start(): Promise<string> {
    const opened = nextNotice(tailer, 'Tailing log file');
    running = tailer.run(controller.signal);
    return opened;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'alert-tail-'));
    file = path.join(dir, 'access.log');
    lines = [];
    controller = new AbortController();
    running = undefined;
    tailer = new FileTailer(file, (line) => { lines.push(line); }, { pollIntervalMs: 10, reopenDelayMs: 10 });
  });

  afterEach(async () => {
    controller.abort();
    await running;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts at the end of the file and delivers appended lines', async () => {
    fs.writeFileSync(file, 'old-1\nold-2\n');
    expect(await start()).toBe(`Tailing log file ${file}`);
    fs.appendFileSync(file, 'new-1\nnew-2\n');
    await vi.waitFor(() => expect(lines).toEqual(['new-1', 'new-2']));
  });

  it('holds a partial line until its newline arrives', async () => {
    fs.writeFileSync(file, '');
    await start();
    fs.appendFileSync(file, '{"status":');
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(lines).toEqual([]);
    fs.appendFileSync(file, '200}\n');
    await vi.waitFor(() => expect(lines).toEqual(['{"status":200}']));
  });

  it('waits for a missing file to appear', async () => {
    const opened = start();
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(tailer.status().open).toBe(false);
    fs.writeFileSync(file, 'before-open\n');
    await opened;
    fs.appendFileSync(file, 'after-open\n');
    await vi.waitFor(() => expect(lines).toEqual(['after-open']));
  });

  it('drains the rotated file and then follows its replacement', async () => {
    fs.writeFileSync(file, '');
    await start();

    const rotated = nextNotice(tailer, 'Log rotation detected');
    const reopened = rotated.then(() => nextNotice(tailer, 'Tailing log file'));
    fs.appendFileSync(file, 'old-1\nold-2\nold-3\n');
    fs.renameSync(file, `${file}.1`);
    fs.writeFileSync(file, '');
    await reopened;

    fs.appendFileSync(file, 'new-1\nnew-2\n');
    await vi.waitFor(() => expect(lines).toHaveLength(5));
    expect(lines).toEqual(['old-1', 'old-2', 'old-3', 'new-1', 'new-2']);
  });

  it('rereads from the start after truncation', async () => {
    fs.writeFileSync(file, '');
    await start();
    fs.appendFileSync(file, 'a\nb\n');
    await vi.waitFor(() => expect(lines).toEqual(['a', 'b']));

    const truncated = nextNotice(tailer, 'Log truncation detected');
    fs.truncateSync(file, 0);
    await truncated;
    fs.appendFileSync(file, 'c\n');
    await vi.waitFor(() => expect(lines).toEqual(['a', 'b', 'c']));
  });

  it('closes when the file is deleted and reopens it when recreated', async () => {
    fs.writeFileSync(file, '');
    await start();
    fs.unlinkSync(file);
    await vi.waitFor(() => expect(tailer.status().open).toBe(false));

    const reopened = nextNotice(tailer, 'Tailing log file');
    fs.writeFileSync(file, '');
    await reopened;
    fs.appendFileSync(file, 'back\n');
    await vi.waitFor(() => expect(lines).toEqual(['back']));
  });

  it('waits for each line handler before reading the next line', async () => {
    const order: string[] = [];
    tailer = new FileTailer(file, async (line) => {
      order.push(`start ${line}`);
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push(`end ${line}`);
    }, { pollIntervalMs: 10, reopenDelayMs: 10 });
    fs.writeFileSync(file, '');
    await start();
    fs.appendFileSync(file, 'one\ntwo\n');
    await vi.waitFor(() => expect(order).toHaveLength(4));
    expect(order).toEqual(['start one', 'end one', 'start two', 'end two']);
  });

  it('resolves run() once aborted', async () => {
    fs.writeFileSync(file, '');
    await start();
    controller.abort();
    await expect(running).resolves.toBeUndefined();
    expect(tailer.status().open).toBe(false);
  });
});
