import fs from 'fs';
import path from 'path';
import { format } from 'util';

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';

const METHODS: readonly ConsoleMethod[] = ['log', 'info', 'warn', 'error', 'debug'];

/**
 * Send console output to an append-only log file so diagnostics do not
 * interleave with the chat. Returns a function that restores the console.
 */
export function redirectConsoleToFile(logFile: string): () => void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const stream = fs.createWriteStream(logFile, { flags: 'a' });
  stream.on('error', err => {
    process.stderr.write(`⚠️ Log file unavailable (${logFile}): ${err.message}\n`);
  });

  const originals = new Map<ConsoleMethod, (...args: unknown[]) => void>();
  for (const method of METHODS) {
    originals.set(method, console[method]);
    console[method] = (...args: unknown[]) => {
      stream.write(`${new Date().toISOString()} ${method.toUpperCase().padEnd(5)} ${format(...args)}\n`);
    };
  }

  return () => {
    for (const [method, original] of originals) {
      console[method] = original;
    }
    stream.end();
  };
}
