import * as fs from 'fs';
import * as path from 'path';
import { CodecName } from '../codec/types.js';

export interface CodecLogEntry {
  ts: string;
  codec: CodecName;
  op: 'parse' | 'serialize';
  bytes: number;
  durMs: number;
  error?: string;
  kind?: string;
}

let logStream: fs.WriteStream | null = null;
let logPath: string | null = null;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Opens (or reopens) the JSONL stream at `target`. Failures disable logging. */
export function openCodecLog(target: string): void {
  if (logStream && logPath === target) return;
  if (logStream) logStream.end();
  logStream = null;
  logPath = target;
  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    const stream = fs.createWriteStream(target, { flags: 'a' });
    stream.on('error', err => {
      console.error(`[Codec] Log stream error: ${err.message}`);
      if (logStream === stream) logStream = null;
    });
    logStream = stream;
  } catch (e) {
    console.error(`[Codec] Failed to initialize log stream: ${errorMessage(e)}`);
  }
}

// LLSD_CODEC_LOG is read on each call so it can be toggled at runtime.
function currentStream(): fs.WriteStream | null {
  const target = process.env.LLSD_CODEC_LOG;
  if (!target) return null;
  if (target !== logPath) openCodecLog(target);
  return logStream;
}

export function logCodecEvent(entry: CodecLogEntry): void {
  const stream = currentStream();
  if (!stream) return;
  try {
    stream.write(JSON.stringify(entry) + '\n');
  } catch (e) {
    console.error(`[Codec] Failed to write log entry: ${errorMessage(e)}`);
  }
}

/** Flushes and closes the stream; the next event reopens it from the environment. */
export function closeCodecLog(): Promise<void> {
  const stream = logStream;
  logStream = null;
  logPath = null;
  if (!stream) return Promise.resolve();
  return new Promise(resolve => stream.end(() => resolve()));
}
