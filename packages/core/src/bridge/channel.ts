import { spawn } from 'node:child_process';
import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';

/**
 * A duplex byte channel to a tool backend.
 *
 * The stdio bridge only needs streams and lifecycle hooks, so tests can swap the
 * spawned process for an in-process backend.
 */
export interface DuplexChannel {
  /** Bytes towards the backend. */
  readonly writable: Writable;

  /** Bytes from the backend. */
  readonly readable: Readable;

  /** Diagnostic output from the backend, if any. */
  readonly stderr?: Readable;

  /** Resolves once the channel is usable, rejects if it cannot be established. */
  readonly ready: Promise<void>;

  /** Called once when the channel ends for any reason other than `close()`. */
  onClose(listener: (reason?: Error) => void): void;

  close(): Promise<void>;
}

export interface ProcessChannelOptions {
  command: string;
  args: readonly string[];
  env?: Record<string, string>;
  cwd?: string;

  /** Grace period between SIGTERM and SIGKILL on close. Defaults to 2s. */
  killTimeoutMs?: number;
}

/**
 * Spawn the backend process and expose its stdio as a channel.
 */
export function spawnProcessChannel(options: ProcessChannelOptions): DuplexChannel {
  const child = spawn(options.command, [...options.args], {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    windowsHide: true,
  });

  let exited = false;
  const listeners = new Set<(reason?: Error) => void>();

  const notify = (reason?: Error): void => {
    if (exited) return;
    exited = true;
    for (const listener of listeners) listener(reason);
  };

  const ready = new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (error) => reject(error));
  });

  child.on('error', (error) => {
    // A failed spawn never emits `exit`.
    if (child.pid === undefined) notify(error);
  });
  child.once('exit', (code, signal) => {
    notify(new Error(`Tool backend exited (code=${String(code)}, signal=${String(signal)})`));
  });

  return {
    writable: child.stdin,
    readable: child.stdout,
    stderr: child.stderr,
    ready,
    onClose: (listener) => {
      listeners.add(listener);
    },
    close: async () => {
      listeners.clear();
      if (exited || child.exitCode !== null || child.signalCode !== null) return;

      const exit = once(child, 'exit');
      child.stdin.end();
      child.kill('SIGTERM');

      const timer = setTimeout(() => child.kill('SIGKILL'), options.killTimeoutMs ?? 2_000);
      try {
        await exit;
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
