import { readFile, writeFile } from "node:fs/promises";
import { Command, Option } from "commander";
import dotenv from "dotenv";
import { type DeployConfig, loadConfig } from "../config/index.js";
import { logger, setLogLevel } from "../config/logger.js";
import { renderDockerfile } from "../image/dockerfile.js";
import { DEFAULT_SUBSTITUTIONS, substituteEnv } from "../image/env-substitution.js";
import { imageBuildArgs } from "../image/image-builder.js";
import { initSentry } from "../observability/sentry.js";
import {
  DeployPipeline,
  formatPipelineResult,
  PIPELINE_STEPS,
  type PipelineDeps,
  type PipelineStep,
  type RunOptions,
  selectSteps,
} from "../pipeline/deploy-pipeline.js";
import { createPipelineDeps } from "../pipeline/services.js";
import { type EnvScope, validateRequiredEnvVars } from "../validate-env.js";

export interface ProgramDeps {
  /** Reads configuration, requiring only what `scopes` use. */
  loadConfig: (env: NodeJS.ProcessEnv, scopes: readonly EnvScope[]) => DeployConfig;
  createPipelineDeps: (config: DeployConfig) => PipelineDeps;
  /** Command output (stdout). Logs go through the logger. */
  out: (text: string) => void;
}

const defaultDeps: ProgramDeps = {
  loadConfig: (env, scopes) => {
    validateRequiredEnvVars(env, scopes);
    return loadConfig(env);
  },
  createPipelineDeps,
  out: (text) => {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  },
};

const SINGLE_STEP_DESCRIPTIONS: Record<PipelineStep, string> = {
  build: "build the application image",
  push: "push the image to ECR",
  deploy: "register the task definition and roll out the ECS service",
  migrate: "apply pending database migrations",
  expose: "bind the domain and TLS certificate to the load balancer",
};

export function buildProgram(overrides: Partial<ProgramDeps> = {}): Command {
  const deps: ProgramDeps = { ...defaultDeps, ...overrides };
  const program = new Command();

  program
    .name("ecs-php-deploy")
    .description("Build, publish and roll out a PHP application on ECS Fargate")
    .option("--env-file <path>", "load variables from a dotenv file before reading configuration")
    .hook("preAction", (thisCommand) => {
      const envFile = thisCommand.opts<{ envFile?: string }>().envFile;
      if (envFile) {
        const loaded = dotenv.config({ path: envFile });
        if (loaded.error) throw loaded.error;
      }
    });

  const resolveConfig = (scopes: readonly EnvScope[]): DeployConfig => {
    const config = deps.loadConfig(process.env, scopes);
    setLogLevel(config.logLevel);
    initSentry(config.sentryDsn, config.nodeEnv);
    return config;
  };

  const runPipeline = async (options: RunOptions): Promise<void> => {
    const config = resolveConfig(selectSteps(options));
    const pipeline = new DeployPipeline(config, deps.createPipelineDeps(config));
    const result = await pipeline.run(options);
    deps.out(formatPipelineResult(result));
    if (!result.success) process.exitCode = 1;
  };

  program
    .command("run")
    .description("run the deploy pipeline: build, push, deploy, migrate, expose")
    .addOption(new Option("--from <step>", "first step to run").choices(PIPELINE_STEPS))
    .addOption(new Option("--to <step>", "last step to run").choices(PIPELINE_STEPS))
    .action(async (opts: RunOptions) => {
      await runPipeline({ from: opts.from, to: opts.to });
    });

  for (const step of PIPELINE_STEPS) {
    program
      .command(step)
      .description(SINGLE_STEP_DESCRIPTIONS[step])
      .action(async () => {
        await runPipeline({ from: step, to: step });
      });
  }

  program
    .command("dockerfile")
    .description("print the Dockerfile the build step uses")
    .action(() => {
      const config = resolveConfig(["dockerfile"]);
      deps.out(
        renderDockerfile({
          baseImage: config.image.baseImage,
          archiveFile: config.source.archiveFile,
          archiveFolder: config.source.archiveFolder,
        }),
      );
    });

  program
    .command("env")
    .description("preview the .env substitutions the image build applies")
    .argument("<file>", "path to a .env file")
    .option("--write", "rewrite the file in place instead of printing it")
    .action(async (file: string, opts: { write?: boolean }) => {
      const config = resolveConfig(["env"]);
      const content = await readFile(file, "utf-8");
      const result = substituteEnv(content, DEFAULT_SUBSTITUTIONS, imageBuildArgs(config));
      for (const key of result.unmatched) {
        logger.warn(`${file} has no ${key}= line; left unchanged`);
      }
      if (opts.write) {
        await writeFile(file, result.content);
        logger.info(`Rewrote ${file}`);
      } else {
        deps.out(result.content);
      }
    });

  return program;
}
