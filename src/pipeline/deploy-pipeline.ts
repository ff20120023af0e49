import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { DeployResult, ServiceDeployer } from "../deploy/service-deployer.js";
import type { DnsExposer, ExposeResult } from "../expose/dns-exposer.js";
import type { ImageBuilder, ImageBuildResult } from "../image/image-builder.js";
import type { DataMigrator, MigrateResult } from "../migrate/data-migrator.js";
import { captureError } from "../observability/sentry.js";
import { imageUri, type PublishResult, type RegistryPublisher } from "../registry/registry-publisher.js";

export const PIPELINE_STEPS = ["build", "push", "deploy", "migrate", "expose"] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export function isPipelineStep(value: string): value is PipelineStep {
  return PIPELINE_STEPS.some((step) => step === value);
}

export interface PipelineDeps {
  imageBuilder: Pick<ImageBuilder, "build">;
  registryPublisher: Pick<RegistryPublisher, "publish">;
  serviceDeployer: Pick<ServiceDeployer, "deploy">;
  dataMigrator: Pick<DataMigrator, "migrate">;
  dnsExposer: Pick<DnsExposer, "expose">;
}

export interface StepOutcome {
  step: PipelineStep;
  success: boolean;
  durationMs: number;
  error?: string;
}

export interface PipelineArtifacts {
  build?: ImageBuildResult;
  push?: PublishResult;
  deploy?: DeployResult;
  migrate?: MigrateResult;
  expose?: ExposeResult;
}

export interface PipelineResult {
  success: boolean;
  imageUri: string;
  steps: StepOutcome[];
  artifacts: PipelineArtifacts;
  failedStep?: PipelineStep;
  error?: string;
}

export interface RunOptions {
  from?: PipelineStep;
  to?: PipelineStep;
}

/** Contiguous slice of the step list; the whole list by default. */
export function selectSteps(options: RunOptions = {}): PipelineStep[] {
  const start = options.from ? PIPELINE_STEPS.indexOf(options.from) : 0;
  const end = options.to ? PIPELINE_STEPS.indexOf(options.to) : PIPELINE_STEPS.length - 1;
  if (start > end) {
    throw new Error(`Step "${options.from}" comes after "${options.to}"`);
  }
  return PIPELINE_STEPS.slice(start, end + 1);
}

/**
 * Runs build -> push -> deploy -> migrate -> expose, one step at a time.
 * The first failure stops the run; nothing is retried or rolled back.
 * Every step's input is derivable from configuration, so a run may start
 * at any step.
 */
export class DeployPipeline {
  constructor(
    private readonly config: DeployConfig,
    private readonly deps: PipelineDeps,
  ) {}

  async run(options: RunOptions = {}): Promise<PipelineResult> {
    const steps = selectSteps(options);
    const artifacts: PipelineArtifacts = {};
    const outcomes: StepOutcome[] = [];
    const uri = imageUri(this.config);

    logger.info(`Deploy pipeline: ${steps.join(" -> ")}`);

    for (const step of steps) {
      const startTime = Date.now();
      logger.info(`[${step}] starting`);
      try {
        await this.runStep(step, artifacts, uri);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        const durationMs = Date.now() - startTime;
        logger.error(`[${step}] failed after ${durationMs}ms`, { err: message });
        captureError(err, { step });
        outcomes.push({ step, success: false, durationMs, error: message });
        return { success: false, imageUri: uri, steps: outcomes, artifacts, failedStep: step, error: message };
      }
      const durationMs = Date.now() - startTime;
      logger.info(`[${step}] done in ${durationMs}ms`);
      outcomes.push({ step, success: true, durationMs });
    }

    return { success: true, imageUri: artifacts.push?.imageUri ?? uri, steps: outcomes, artifacts };
  }

  private async runStep(step: PipelineStep, artifacts: PipelineArtifacts, uri: string): Promise<void> {
    switch (step) {
      case "build":
        artifacts.build = await this.deps.imageBuilder.build(this.config);
        return;
      case "push":
        artifacts.push = await this.deps.registryPublisher.publish(this.config);
        return;
      case "deploy":
        artifacts.deploy = await this.deps.serviceDeployer.deploy(this.config, artifacts.push?.imageUri ?? uri);
        return;
      case "migrate":
        artifacts.migrate = await this.deps.dataMigrator.migrate(this.config);
        return;
      case "expose":
        artifacts.expose = await this.deps.dnsExposer.expose(this.config);
        return;
    }
  }
}

/** One line per step, e.g. `deploy   ok      1532ms`. */
export function formatPipelineResult(result: PipelineResult): string {
  const lines = result.steps.map((s) => {
    const status = s.success ? "ok" : "FAILED";
    const line = `${s.step.padEnd(8)} ${status.padEnd(7)} ${s.durationMs}ms`;
    return s.error ? `${line}  ${s.error}` : line;
  });
  lines.push(result.success ? `Deployed ${result.imageUri}` : `Stopped at ${result.failedStep ?? "unknown step"}`);
  return lines.join("\n");
}
