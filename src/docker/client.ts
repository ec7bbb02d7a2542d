/**
 * Docker CLI client wrapper using child_process
 */

import { spawn } from "node:child_process";
import { createLogger } from "../utils/logger";

const log = createLogger("docker");

export const DOCKER_BINARY = process.env.DOCKER_BIN || "docker";

export interface DockerRunResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * A docker invocation that exited non-zero
 */
export class DockerCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly result: DockerRunResult,
  ) {
    const details = result.stderr || result.stdout || `exit ${result.exitCode}`;
    super(`docker ${args[0] ?? ""} failed: ${details}`);
    this.name = "DockerCommandError";
  }
}

/**
 * Run a command to completion, collecting its output.
 * Rejects only when the process cannot be started.
 */
export function runCommand(command: string, args: string[]): Promise<DockerRunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (code) => {
      const exitCode = code ?? 1;
      resolve({
        success: exitCode === 0,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode,
      });
    });
  });
}

/**
 * Run a Docker command and return the result
 */
export async function dockerRun(args: string[]): Promise<DockerRunResult> {
  log.debug(`docker ${args.join(" ")}`);
  return runCommand(DOCKER_BINARY, args);
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  try {
    const result = await dockerRun(["info"]);
    return result.success;
  } catch (error) {
    log.debug(`Docker is not available: ${(error as Error).message}`);
    return false;
  }
}

/**
 * Get Docker version information
 */
export async function getDockerVersion(): Promise<string | null> {
  const result = await dockerRun(["version", "--format", "{{.Server.Version}}"]);
  if (result.success) {
    return result.stdout;
  }
  return null;
}
