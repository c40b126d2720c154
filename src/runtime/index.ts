import { x } from "tinyexec";
import { readFile, access } from "node:fs/promises";

/**
 * Read file contents as text
 */
export async function readTextFile(path: string): Promise<string> {
  return readFile(path, "utf-8");
}

/**
 * Check if file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read all of stdin as text
 */
export async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf-8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

export interface SpawnResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Spawn a subprocess and capture output. Never throws on a non-zero exit;
 * callers inspect `exitCode`, which is 1 when the process reported none
 * (e.g. the command does not exist).
 */
export async function spawn(
  cmd: string,
  args: string[],
  options?: { cwd?: string }
): Promise<SpawnResult> {
  const result = await x(cmd, args, {
    nodeOptions: { cwd: options?.cwd },
    throwOnError: false,
  });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? 1,
  };
}
