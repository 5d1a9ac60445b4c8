import { spawn } from "node:child_process";

export interface SpawnWithTimeoutOptions {
  command: string[];
  timeout?: number;
}

export interface SpawnResult {
  stdout: Buffer;
  stderr: Buffer;
  exitCode: number;
  timedOut: boolean;
}

const DEFAULT_TIMEOUT = 15000;

export async function spawnWithTimeout(options: SpawnWithTimeoutOptions): Promise<SpawnResult> {
  const { command, timeout = DEFAULT_TIMEOUT } = options;
  const [executable, ...args] = command;
  if (!executable) throw new Error("Process failed: empty command");

  return new Promise<SpawnResult>((resolve, reject) => {
    const proc = spawn(executable, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
      setTimeout(() => {
        if (proc.exitCode === null) proc.kill("SIGKILL");
      }, 1000).unref();
    }, timeout);

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (error) => {
      clearTimeout(timeoutId);
      reject(new Error(`Process failed: ${command.join(" ")}: ${error.message}`));
    });

    proc.on("close", (code) => {
      clearTimeout(timeoutId);
      if (timedOut) {
        resolve({ stdout: Buffer.alloc(0), stderr: Buffer.alloc(0), exitCode: -1, timedOut: true });
        return;
      }
      resolve({
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
        exitCode: code ?? -1,
        timedOut: false,
      });
    });
  });
}
