#!/usr/bin/env node
import { ConfigError, loadConfig, WatcherConfig } from './config';
import { FileTailer } from './fileTailer';
import { AlertWatcher } from './watcher';
import { createServer } from './server';
import { log } from './logger';

async function startStatusServer(config: WatcherConfig, watcher: AlertWatcher, tailer: FileTailer) {
  const { server, wss, listen } = createServer(watcher, tailer, config);
  await listen(config.statusPort, config.statusHost);
  wss.on('error', (err: Error) => log(`Status server error: ${err.message}`));
  log(`Status server listening on http://${config.statusHost}:${config.statusPort}`);
  return () => {
    wss.close();
    server.close();
  };
}

async function main(): Promise<void> {
  let config: WatcherConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log(err.message);
      process.exit(1);
    }
    throw err;
  }

  const watcher = new AlertWatcher(config);
  const tailer = new FileTailer(config.logPath, (line) => watcher.processLine(line));
  tailer.on('notice', (msg: string) => log(msg));
  const stopServer = config.statusPort > 0 ? await startStatusServer(config, watcher, tailer) : undefined;

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    log(`Shutting down after ${signal}.`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await tailer.run(controller.signal);
  stopServer?.();
}

main().then(
  () => process.exit(0),
  (err) => {
    log(`Fatal error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    process.exit(1);
  },
);
