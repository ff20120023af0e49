import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { z } from "zod";
import { logger } from "../config/logger.js";

const execFileAsync = promisify(execFile);

/** Large enough for describe-* listings. */
const MAX_BUFFER = 16 * 1024 * 1024;

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { maxBuffer: number },
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFileFn = (file, args, options) => execFileAsync(file, args, options);

export class AwsCliError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`aws ${command} failed (exit ${exitCode ?? "unknown"}): ${stderr.trim() || "no output"}`);
    this.name = "AwsCliError";
  }
}

/** The subset of the AWS CLI the deploy steps depend on. */
export interface IAwsCli {
  /** Run a command and validate its JSON output. */
  run<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  /** Run a command whose output is not needed (waiters, puts). */
  exec(args: string[]): Promise<void>;
}

/**
 * Wraps the `aws` command line tool. Arguments are passed as an array via
 * execFile so no value is ever interpreted by a shell.
 */
export class AwsCli implements IAwsCli {
  constructor(
    private readonly region: string,
    private readonly execFn: ExecFileFn = defaultExec,
  ) {}

  async run<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const stdout = await this.invoke(args);
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new AwsCliError(commandName(args), 0, `unparseable output: ${stdout.slice(0, 200)}`);
    }
    return schema.parse(parsed);
  }

  async exec(args: string[]): Promise<void> {
    await this.invoke(args);
  }

  private async invoke(args: string[]): Promise<string> {
    const command = commandName(args);
    const fullArgs = [...args, "--region", this.region, "--output", "json"];
    logger.debug(`aws ${command}`);
    try {
      const { stdout } = await this.execFn("aws", fullArgs, { maxBuffer: MAX_BUFFER });
      return stdout;
    } catch (err) {
      throw toAwsCliError(command, err);
    }
  }
}

/** `ecs register-task-definition` from the full argument list. */
export function commandName(args: readonly string[]): string {
  return args.slice(0, 2).join(" ");
}

function toAwsCliError(command: string, err: unknown): AwsCliError {
  if (err instanceof Error) {
    const exitCode = "code" in err && typeof err.code === "number" ? err.code : null;
    const stderr = "stderr" in err && typeof err.stderr === "string" && err.stderr ? err.stderr : err.message;
    return new AwsCliError(command, exitCode, stderr);
  }
  return new AwsCliError(command, null, String(err));
}
