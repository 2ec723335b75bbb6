import { spawn } from "node:child_process";

export type RunCommandResult = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly code: number;
};

/** Runs an external program to completion; rejects with CommandError on a non-zero exit. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<RunCommandResult>;

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    super(`Command "${command} ${args.join(" ")}" failed with exit code ${exitCode}`);
    this.name = "CommandError";
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = stderr.toString("utf8");
  }
}

export const runCommand: CommandRunner = async (command, args) => {
  const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

  const exitCode: number = await new Promise((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? -1));
  });

  const stdout = Buffer.concat(stdoutChunks);
  const stderr = Buffer.concat(stderrChunks);
  if (exitCode !== 0) throw new CommandError(command, [...args], exitCode, stderr);
  return { stdout, stderr, code: exitCode };
};
