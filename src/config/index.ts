import { z } from "zod";

/**
 * Parse a comma-separated list of identifiers (subnet ids, security group ids).
 * Example: "subnet-0a1b,subnet-0c2d"
 */
function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const required = z.string().min(1);

/**
 * A setting only some commands need. Presence is checked per command by
 * `validateRequiredEnvVars`; unset reads as "".
 */
const stepSetting = z.string().default("");

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const configSchema = z
  .object({
    nodeEnv: z.enum(["development", "production", "test"]).default("development"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
    sentryDsn: z.string().optional(),

    /** Source archive of the PHP application. */
    source: z.object({
      token: stepSetting,
      username: stepSetting,
      repository: stepSetting,
      archiveFile: stepSetting,
      archiveFolder: stepSetting,
    }),

    app: z.object({
      env: required.default("production"),
      domainName: stepSetting,
    }),

    /** Database the application talks to and the migrations are applied to. */
    db: z.object({
      host: stepSetting,
      name: stepSetting,
      username: stepSetting,
      password: stepSetting,
      port: z.coerce.number().int().min(1).max(65535).default(3306),
      /** Secrets Manager secret with `username` and `password` keys, injected at container start. */
      credentialsSecretArn: z.string().min(1).optional(),
    }),

    image: z.object({
      name: required.default("php-app"),
      tag: required.default("latest"),
      baseImage: required.default("ubuntu:22.04"),
      dockerSocket: required.default("/var/run/docker.sock"),
    }),

    aws: z.object({
      region: stepSetting,
      accountId: stepSetting,
    }),

    ecr: z.object({
      repository: z.string().min(1).optional(),
    }),

    ecs: z.object({
      cluster: stepSetting,
      service: stepSetting,
      taskFamily: z.string().min(1).optional(),
      containerName: required.default("web"),
      cpu: z.coerce.number().int().positive().default(512),
      memory: z.coerce.number().int().positive().default(1024),
      executionRoleArn: stepSetting,
      subnets: z.array(required).default([]),
      securityGroups: z.array(required).default([]),
      desiredCount: z.coerce.number().int().min(0).default(2),
      minCapacity: z.coerce.number().int().min(0).default(1),
      maxCapacity: z.coerce.number().int().min(1).default(4),
      targetRequestsPerTarget: z.coerce.number().positive().default(1000),
      waitForStable: flag,
    }),

    loadBalancer: z.object({
      arn: stepSetting,
      targetGroupArn: stepSetting,
    }),

    dns: z.object({
      hostedZoneId: stepSetting,
    }),

    migrate: z.object({
      dir: required.default("./migrations"),
    }),
  })
  .refine((c) => c.ecs.minCapacity <= c.ecs.maxCapacity, {
    message: "ECS_MIN_CAPACITY must not exceed ECS_MAX_CAPACITY",
    path: ["ecs", "minCapacity"],
  })
  .transform((c) => ({
    ...c,
    ecr: { repository: c.ecr.repository ?? c.image.name },
    ecs: { ...c.ecs, taskFamily: c.ecs.taskFamily ?? c.ecs.service },
  }));

export type DeployConfig = z.output<typeof configSchema>;

/**
 * Build the deploy configuration from environment variables.
 * Empty strings count as unset so `KEY=` lines in an env file fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeployConfig {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === "" ? undefined : value;
  };

  const config = configSchema.parse({
    nodeEnv: read("NODE_ENV"),
    logLevel: read("LOG_LEVEL"),
    sentryDsn: read("SENTRY_DSN"),
    source: {
      token: read("GITHUB_PAT"),
      username: read("GITHUB_USERNAME"),
      repository: read("GITHUB_REPOSITORY"),
      archiveFile: read("SOURCE_ARCHIVE_FILE"),
      archiveFolder: read("SOURCE_ARCHIVE_FOLDER"),
    },
    app: {
      env: read("APP_ENV"),
      domainName: read("DOMAIN_NAME"),
    },
    db: {
      host: read("RDS_ENDPOINT"),
      name: read("RDS_DATABASE"),
      username: read("RDS_USERNAME"),
      password: read("RDS_PASSWORD"),
      port: read("RDS_PORT"),
      credentialsSecretArn: read("DB_CREDENTIALS_SECRET_ARN"),
    },
    image: {
      name: read("IMAGE_NAME"),
      tag: read("IMAGE_TAG"),
      baseImage: read("BASE_IMAGE"),
      dockerSocket: read("DOCKER_SOCKET"),
    },
    aws: {
      region: read("AWS_REGION"),
      accountId: read("AWS_ACCOUNT_ID"),
    },
    ecr: {
      repository: read("ECR_REPOSITORY"),
    },
    ecs: {
      cluster: read("ECS_CLUSTER"),
      service: read("ECS_SERVICE"),
      taskFamily: read("ECS_TASK_FAMILY"),
      containerName: read("ECS_CONTAINER_NAME"),
      cpu: read("ECS_TASK_CPU"),
      memory: read("ECS_TASK_MEMORY"),
      executionRoleArn: read("ECS_EXECUTION_ROLE_ARN"),
      subnets: parseList(read("ECS_SUBNETS")),
      securityGroups: parseList(read("ECS_SECURITY_GROUPS")),
      desiredCount: read("ECS_DESIRED_COUNT"),
      minCapacity: read("ECS_MIN_CAPACITY"),
      maxCapacity: read("ECS_MAX_CAPACITY"),
      targetRequestsPerTarget: read("ECS_TARGET_REQUESTS_PER_TARGET"),
      waitForStable: read("ECS_WAIT_FOR_STABLE"),
    },
    loadBalancer: {
      arn: read("LOAD_BALANCER_ARN"),
      targetGroupArn: read("TARGET_GROUP_ARN"),
    },
    dns: {
      hostedZoneId: read("HOSTED_ZONE_ID"),
    },
    migrate: {
      dir: read("MIGRATIONS_DIR"),
    },
  });

  return Object.freeze(config);
}
