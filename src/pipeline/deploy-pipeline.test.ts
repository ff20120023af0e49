import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock("../observability/sentry.js", () => ({
  captureError: vi.fn(),
}));

import { captureError } from "../observability/sentry.js";
import { testConfig } from "../test/config.js";
import {
  DeployPipeline,
  formatPipelineResult,
  isPipelineStep,
  type PipelineResult,
  selectSteps,
} from "./deploy-pipeline.js";

const PUSHED = "123456789012.dkr.ecr.us-east-1.amazonaws.com/php-app:latest";

function fakeDeps() {
  const order: string[] = [];
  const record =
    <T>(name: string, value: T) =>
    async () => {
      order.push(name);
      return value;
    };
  return {
    order,
    deps: {
      imageBuilder: { build: vi.fn(record("build", { imageTag: "php-app:latest", buildArgs: ["APP_ENV"] })) },
      registryPublisher: { publish: vi.fn(record("push", { imageUri: PUSHED })) },
      serviceDeployer: {
        deploy: vi.fn(
          record("deploy", { taskDefinitionArn: "arn:task-def/shop-web:3", serviceArn: "arn:service/shop-web", created: false }),
        ),
      },
      dataMigrator: { migrate: vi.fn(record("migrate", { migrations: ["0000_create_users"] })) },
      dnsExposer: {
        expose: vi.fn(
          record("expose", { certificateArn: "arn:cert", loadBalancerDnsName: "lb.example", listenerCreated: false }),
        ),
      },
    },
  };
}

describe("selectSteps", () => {
  it("returns every step in order by default", () => {
    expect(selectSteps()).toEqual(["build", "push", "deploy", "migrate", "expose"]);
  });

  it("returns a contiguous slice", () => {
    expect(selectSteps({ from: "push", to: "migrate" })).toEqual(["push", "deploy", "migrate"]);
    expect(selectSteps({ from: "migrate" })).toEqual(["migrate", "expose"]);
    expect(selectSteps({ to: "build" })).toEqual(["build"]);
  });

  it("rejects a range that runs backwards", () => {
    expect(() => selectSteps({ from: "expose", to: "push" })).toThrow('Step "expose" comes after "push"');
  });
});

describe("isPipelineStep", () => {
  it("recognises step names only", () => {
    expect(isPipelineStep("deploy")).toBe(true);
    expect(isPipelineStep("rollback")).toBe(false);
  });
});

describe("DeployPipeline", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("runs every step in order and reports the pushed image", async () => {
    const { deps, order } = fakeDeps();
    const config = testConfig();

    const result = await new DeployPipeline(config, deps).run();

    expect(order).toEqual(["build", "push", "deploy", "migrate", "expose"]);
    expect(result.success).toBe(true);
    expect(result.imageUri).toBe(PUSHED);
    expect(result.steps.map((s) => [s.step, s.success])).toEqual([
      ["build", true],
      ["push", true],
      ["deploy", true],
      ["migrate", true],
      ["expose", true],
    ]);
    expect(result.artifacts.migrate).toEqual({ migrations: ["0000_create_users"] });
    expect(deps.serviceDeployer.deploy).toHaveBeenCalledWith(config, PUSHED);
  });

  it("deploys the URI the push step returned", async () => {
    const { deps } = fakeDeps();
    deps.registryPublisher.publish.mockResolvedValueOnce({ imageUri: "registry.test/shop:sha-abc" });

    const result = await new DeployPipeline(testConfig(), deps).run({ from: "push", to: "deploy" });

    expect(deps.serviceDeployer.deploy).toHaveBeenCalledWith(expect.anything(), "registry.test/shop:sha-abc");
    expect(result.imageUri).toBe("registry.test/shop:sha-abc");
  });

  it("starting at deploy uses the image URI derived from configuration", async () => {
    const { deps, order } = fakeDeps();

    const result = await new DeployPipeline(testConfig({ IMAGE_TAG: "v2" }), deps).run({ from: "deploy" });

    expect(order).toEqual(["deploy", "migrate", "expose"]);
    expect(deps.serviceDeployer.deploy).toHaveBeenCalledWith(
      expect.anything(),
      "123456789012.dkr.ecr.us-east-1.amazonaws.com/php-app:v2",
    );
    expect(result.imageUri).toBe("123456789012.dkr.ecr.us-east-1.amazonaws.com/php-app:v2");
  });

  it("stops at the first failure and reports it", async () => {
    const { deps, order } = fakeDeps();
    const failure = new Error("aws ecs create-service failed (exit 255): AccessDenied");
    deps.serviceDeployer.deploy.mockRejectedValueOnce(failure);

    const result = await new DeployPipeline(testConfig(), deps).run();

    expect(order).toEqual(["build", "push"]);
    expect(deps.dataMigrator.migrate).not.toHaveBeenCalled();
    expect(deps.dnsExposer.expose).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    expect(result.failedStep).toBe("deploy");
    expect(result.error).toBe("aws ecs create-service failed (exit 255): AccessDenied");
    expect(result.steps).toHaveLength(3);
    expect(result.steps[2]).toEqual({
      step: "deploy",
      success: false,
      durationMs: expect.any(Number),
      error: "aws ecs create-service failed (exit 255): AccessDenied",
    });
    expect(captureError).toHaveBeenCalledWith(failure, { step: "deploy" });
  });

  it("reports a non-Error rejection by its string form", async () => {
    const { deps } = fakeDeps();
    deps.imageBuilder.build.mockRejectedValueOnce("daemon unavailable");

    const result = await new DeployPipeline(testConfig(), deps).run();

    expect(result.failedStep).toBe("build");
    expect(result.error).toBe("daemon unavailable");
  });
});

describe("formatPipelineResult", () => {
  it("prints one aligned line per step and the outcome", () => {
    const result: PipelineResult = {
      success: false,
      imageUri: PUSHED,
      steps: [
        { step: "build", success: true, durationMs: 1200 },
        { step: "push", success: false, durationMs: 30, error: "denied" },
      ],
      artifacts: {},
      failedStep: "push",
      error: "denied",
    };
    expect(formatPipelineResult(result)).toBe(
      ["build    ok      1200ms", "push     FAILED  30ms  denied", "Stopped at push"].join("\n"),
    );
  });

  it("ends with the deployed image on success", () => {
    const result: PipelineResult = {
      success: true,
      imageUri: PUSHED,
      steps: [{ step: "expose", success: true, durationMs: 5 }],
      artifacts: {},
    };
    expect(formatPipelineResult(result)).toBe(`expose   ok      5ms\nDeployed ${PUSHED}`);
  });
});
