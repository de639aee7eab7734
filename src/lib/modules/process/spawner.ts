import { spawn } from "child_process";
import type { Readable } from "stream";

export interface SpawnRequest {
  command: string;
  args: readonly string[];
  env: Record<string, string>;
  cwd?: string;
}

/**
 * The slice of a child process EProcess relies on. `nodeSpawner` backs it
 * with child_process; tests back it with an in-process fake.
 */
export interface ChildHandle {
  /** Undefined until the OS has created the process (and forever if it failed to) */
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  onError(listener: (err: Error) => void): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  /** Fires after exit once both pipes are closed */
  onClose(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  kill(signal: NodeJS.Signals): boolean;
}

export type Spawner = (request: SpawnRequest) => ChildHandle;

/** Spawns through child_process with stdin ignored and stdout/stderr piped. */
export const nodeSpawner: Spawner = (request) => {
  const child = spawn(request.command, [...request.args], {
    cwd: request.cwd,
    env: request.env,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

  return {
    get pid() {
      return child.pid;
    },
    stdout: child.stdout,
    stderr: child.stderr,
    onError: (listener) => {
      child.on("error", listener);
    },
    onExit: (listener) => {
      child.on("exit", listener);
    },
    onClose: (listener) => {
      child.on("close", listener);
    },
    kill: (signal) => child.kill(signal),
  };
};
