import { z } from "zod";
import { AwsCliError, type IAwsCli } from "../aws/aws-cli.js";
import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { buildTaskDefinition, logGroupName } from "./task-definition.js";

const registerSchema = z.object({
  taskDefinition: z.object({
    taskDefinitionArn: z.string(),
    revision: z.number().int().optional(),
  }),
});

const describeServicesSchema = z.object({
  services: z.array(
    z.object({
      serviceArn: z.string(),
      status: z.string(),
    }),
  ),
});

const serviceSchema = z.object({
  service: z.object({
    serviceArn: z.string(),
  }),
});

export interface DeployResult {
  taskDefinitionArn: string;
  serviceArn: string;
  /** True when the service did not exist and was created. */
  created: boolean;
}

/** Port the load balancer forwards to. */
const WEB_PORT = 80;

const SCALABLE_DIMENSION = "ecs:service:DesiredCount";

/**
 * Resource label for `ALBRequestCountPerTarget`:
 * `app/<lb-name>/<lb-id>/targetgroup/<tg-name>/<tg-id>`.
 */
export function albResourceLabel(loadBalancerArn: string, targetGroupArn: string): string {
  const lb = /:loadbalancer\/(app\/[^/]+\/[^/]+)$/.exec(loadBalancerArn)?.[1];
  if (!lb) throw new Error(`Not an application load balancer ARN: ${loadBalancerArn}`);
  const tg = /:(targetgroup\/[^/]+\/[^/]+)$/.exec(targetGroupArn)?.[1];
  if (!tg) throw new Error(`Not a target group ARN: ${targetGroupArn}`);
  return `${lb}/${tg}`;
}

/**
 * Registers a task definition for the pushed image and rolls it out as a
 * Fargate service behind the load balancer, scaled on request count.
 * No rollback: a failure leaves whatever the orchestrator already accepted.
 */
export class ServiceDeployer {
  constructor(private readonly aws: IAwsCli) {}

  async deploy(config: DeployConfig, image: string): Promise<DeployResult> {
    const { ecs } = config;

    const registered = await this.aws.run(
      ["ecs", "register-task-definition", "--cli-input-json", JSON.stringify(buildTaskDefinition(config, image))],
      registerSchema,
    );
    const taskDefinitionArn = registered.taskDefinition.taskDefinitionArn;
    logger.info(`Registered task definition ${taskDefinitionArn}`);

    await this.ensureLogGroup(logGroupName(config));

    const described = await this.aws.run(
      ["ecs", "describe-services", "--cluster", ecs.cluster, "--services", ecs.service],
      describeServicesSchema,
    );
    const existing = described.services.find((s) => s.status !== "INACTIVE");
    // A DRAINING service can be neither updated nor recreated under the same name.
    if (existing && existing.status !== "ACTIVE") {
      throw new Error(
        `Service ${ecs.service} on ${ecs.cluster} is ${existing.status}; wait until it is INACTIVE and deploy again`,
      );
    }

    let serviceArn: string;
    if (existing) {
      const updated = await this.aws.run(
        [
          "ecs",
          "update-service",
          "--cli-input-json",
          JSON.stringify({
            cluster: ecs.cluster,
            service: ecs.service,
            taskDefinition: taskDefinitionArn,
            desiredCount: ecs.desiredCount,
          }),
        ],
        serviceSchema,
      );
      serviceArn = updated.service.serviceArn;
      logger.info(`Updated service ${ecs.service} on ${ecs.cluster}`);
    } else {
      const created = await this.aws.run(
        [
          "ecs",
          "create-service",
          "--cli-input-json",
          JSON.stringify({
            cluster: ecs.cluster,
            serviceName: ecs.service,
            taskDefinition: taskDefinitionArn,
            desiredCount: ecs.desiredCount,
            launchType: "FARGATE",
            loadBalancers: [
              {
                targetGroupArn: config.loadBalancer.targetGroupArn,
                containerName: ecs.containerName,
                containerPort: WEB_PORT,
              },
            ],
            networkConfiguration: {
              awsvpcConfiguration: {
                subnets: ecs.subnets,
                securityGroups: ecs.securityGroups,
                assignPublicIp: "DISABLED",
              },
            },
            healthCheckGracePeriodSeconds: 60,
          }),
        ],
        serviceSchema,
      );
      serviceArn = created.service.serviceArn;
      logger.info(`Created service ${ecs.service} on ${ecs.cluster}`);
    }

    await this.configureScaling(config);

    if (ecs.waitForStable) {
      logger.info(`Waiting for ${ecs.service} to become stable`);
      await this.aws.exec(["ecs", "wait", "services-stable", "--cluster", ecs.cluster, "--services", ecs.service]);
    }

    return { taskDefinitionArn, serviceArn, created: !existing };
  }

  private async ensureLogGroup(name: string): Promise<void> {
    try {
      await this.aws.exec(["logs", "create-log-group", "--log-group-name", name]);
      logger.info(`Created log group ${name}`);
    } catch (err) {
      if (err instanceof AwsCliError && err.stderr.includes("ResourceAlreadyExistsException")) return;
      throw err;
    }
  }

  private async configureScaling(config: DeployConfig): Promise<void> {
    const { ecs, loadBalancer } = config;
    const resourceId = `service/${ecs.cluster}/${ecs.service}`;

    await this.aws.exec([
      "application-autoscaling",
      "register-scalable-target",
      "--service-namespace",
      "ecs",
      "--resource-id",
      resourceId,
      "--scalable-dimension",
      SCALABLE_DIMENSION,
      "--min-capacity",
      String(ecs.minCapacity),
      "--max-capacity",
      String(ecs.maxCapacity),
    ]);

    await this.aws.exec([
      "application-autoscaling",
      "put-scaling-policy",
      "--service-namespace",
      "ecs",
      "--resource-id",
      resourceId,
      "--scalable-dimension",
      SCALABLE_DIMENSION,
      "--policy-name",
      `${ecs.service}-request-count`,
      "--policy-type",
      "TargetTrackingScaling",
      "--target-tracking-scaling-policy-configuration",
      JSON.stringify({
        TargetValue: ecs.targetRequestsPerTarget,
        PredefinedMetricSpecification: {
          PredefinedMetricType: "ALBRequestCountPerTarget",
          ResourceLabel: albResourceLabel(loadBalancer.arn, loadBalancer.targetGroupArn),
        },
        ScaleInCooldown: 60,
        ScaleOutCooldown: 60,
      }),
    ]);

    logger.info(`Scaling ${resourceId} between ${ecs.minCapacity} and ${ecs.maxCapacity} tasks`);
  }
}
