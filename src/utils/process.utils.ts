import fs from "fs";
import path from "path";
import { execFile } from "child_process";

/**
 * Looks an executable up the way a shell would; returns its path or null
 */
export function findExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ""
): string | null {
  const candidates = command.includes(path.sep)
    ? [path.resolve(command)]
    : searchPath
        .split(path.delimiter)
        .filter(Boolean)
        .map((dir) => path.join(dir, command));

  for (const candidate of candidates) {
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      if (fs.statSync(candidate).isFile()) {
        return candidate;
      }
    } catch {
      // not here, keep looking
    }
  }
  return null;
}

/**
 * True when spawning failed because the program does not exist
 */
export function isMissingExecutableError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a program without a shell and collects its output.
 * Resolves with the exit code for ordinary failures (non-zero exit, timeout);
 * rejects only when the program could not be started.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  options: { timeoutMs?: number } = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        encoding: "utf8",
        timeout: options.timeoutMs ?? 0,
        maxBuffer: 16 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (isMissingExecutableError(error)) {
          reject(error);
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : 1;
        resolve({
          exitCode: exitCode === 0 ? 1 : exitCode,
          stdout,
          stderr: stderr || error.message,
        });
      }
    );
  });
}
