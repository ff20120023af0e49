import type { DeployConfig } from "../config/index.js";

/** Ports the container exposes: the web server and the database client port. */
export const CONTAINER_PORTS = [80, 3306] as const;

export interface KeyValuePair {
  name: string;
  value: string;
}

export interface SecretReference {
  name: string;
  valueFrom: string;
}

export interface ContainerDefinition {
  name: string;
  image: string;
  essential: true;
  portMappings: Array<{ containerPort: number; protocol: "tcp" }>;
  environment: KeyValuePair[];
  secrets: SecretReference[];
  logConfiguration: {
    logDriver: "awslogs";
    options: Record<string, string>;
  };
}

/** Input of `ecs register-task-definition --cli-input-json`. */
export interface TaskDefinitionInput {
  family: string;
  requiresCompatibilities: ["FARGATE"];
  networkMode: "awsvpc";
  cpu: string;
  memory: string;
  executionRoleArn: string;
  containerDefinitions: [ContainerDefinition];
}

/**
 * Database credentials for the container, resolved when the task starts.
 * With a Secrets Manager secret they never appear in the task definition.
 */
export function credentialInjection(config: DeployConfig): Pick<ContainerDefinition, "environment" | "secrets"> {
  const environment: KeyValuePair[] = [{ name: "DB_PORT", value: String(config.db.port) }];
  const arn = config.db.credentialsSecretArn;
  if (arn) {
    return {
      environment,
      secrets: [
        { name: "DB_USERNAME", valueFrom: `${arn}:username::` },
        { name: "DB_PASSWORD", valueFrom: `${arn}:password::` },
      ],
    };
  }
  return {
    environment: [
      ...environment,
      { name: "DB_USERNAME", value: config.db.username },
      { name: "DB_PASSWORD", value: config.db.password },
    ],
    secrets: [],
  };
}

/** CloudWatch log group the container writes to; created by the deploy step. */
export function logGroupName(config: DeployConfig): string {
  return `/ecs/${config.ecs.taskFamily}`;
}

export function buildTaskDefinition(config: DeployConfig, image: string): TaskDefinitionInput {
  const { ecs, aws } = config;
  return {
    family: ecs.taskFamily,
    requiresCompatibilities: ["FARGATE"],
    networkMode: "awsvpc",
    cpu: String(ecs.cpu),
    memory: String(ecs.memory),
    executionRoleArn: ecs.executionRoleArn,
    containerDefinitions: [
      {
        name: ecs.containerName,
        image,
        essential: true,
        portMappings: CONTAINER_PORTS.map((containerPort) => ({ containerPort, protocol: "tcp" as const })),
        ...credentialInjection(config),
        logConfiguration: {
          logDriver: "awslogs",
          options: {
            "awslogs-group": logGroupName(config),
            "awslogs-region": aws.region,
            "awslogs-stream-prefix": "ecs",
          },
        },
      },
    ],
  };
}
