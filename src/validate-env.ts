import type { PipelineStep } from "./pipeline/deploy-pipeline.js";

/** Every variable some command needs, in the order missing ones are reported. */
export const REQUIRED_ENV_VARS = [
  "GITHUB_PAT",
  "GITHUB_USERNAME",
  "GITHUB_REPOSITORY",
  "SOURCE_ARCHIVE_FILE",
  "SOURCE_ARCHIVE_FOLDER",
  "DOMAIN_NAME",
  "RDS_ENDPOINT",
  "RDS_DATABASE",
  "RDS_USERNAME",
  "RDS_PASSWORD",
  "AWS_REGION",
  "AWS_ACCOUNT_ID",
  "ECS_CLUSTER",
  "ECS_SERVICE",
  "ECS_EXECUTION_ROLE_ARN",
  "ECS_SUBNETS",
  "ECS_SECURITY_GROUPS",
  "TARGET_GROUP_ARN",
  "LOAD_BALANCER_ARN",
  "HOSTED_ZONE_ID",
] as const;

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

/** What a command touches: a pipeline step, or one of the local previews. */
export type EnvScope = PipelineStep | "dockerfile" | "env";

export const ENV_SCOPES: readonly EnvScope[] = ["build", "push", "deploy", "migrate", "expose", "dockerfile", "env"];

const ENV_VARS_BY_SCOPE: Readonly<Record<EnvScope, readonly RequiredEnvVar[]>> = {
  build: [
    "GITHUB_PAT",
    "GITHUB_USERNAME",
    "GITHUB_REPOSITORY",
    "SOURCE_ARCHIVE_FILE",
    "SOURCE_ARCHIVE_FOLDER",
    "DOMAIN_NAME",
    "RDS_ENDPOINT",
    "RDS_DATABASE",
  ],
  push: ["AWS_REGION", "AWS_ACCOUNT_ID"],
  deploy: [
    "AWS_REGION",
    "AWS_ACCOUNT_ID",
    "RDS_USERNAME",
    "RDS_PASSWORD",
    "ECS_CLUSTER",
    "ECS_SERVICE",
    "ECS_EXECUTION_ROLE_ARN",
    "ECS_SUBNETS",
    "ECS_SECURITY_GROUPS",
    "TARGET_GROUP_ARN",
    "LOAD_BALANCER_ARN",
  ],
  migrate: ["RDS_ENDPOINT", "RDS_DATABASE", "RDS_USERNAME", "RDS_PASSWORD"],
  expose: ["AWS_REGION", "DOMAIN_NAME", "TARGET_GROUP_ARN", "LOAD_BALANCER_ARN", "HOSTED_ZONE_ID"],
  dockerfile: ["SOURCE_ARCHIVE_FILE", "SOURCE_ARCHIVE_FOLDER"],
  env: ["DOMAIN_NAME", "RDS_ENDPOINT", "RDS_DATABASE"],
};

/**
 * Variables the given scopes need. With a Secrets Manager reference the deploy
 * step takes the database credentials from the secret instead.
 */
export function requiredEnvVarsFor(
  scopes: readonly EnvScope[],
  env: NodeJS.ProcessEnv = process.env,
): RequiredEnvVar[] {
  const needed = new Set<RequiredEnvVar>();
  for (const scope of scopes) {
    for (const name of ENV_VARS_BY_SCOPE[scope]) {
      if (scope === "deploy" && env.DB_CREDENTIALS_SECRET_ARN && (name === "RDS_USERNAME" || name === "RDS_PASSWORD")) {
        continue;
      }
      needed.add(name);
    }
  }
  return REQUIRED_ENV_VARS.filter((name) => needed.has(name));
}

/**
 * Startup environment variable validation.
 *
 * Throws on missing required vars for the scopes about to run, listing all of
 * them at once. Warns on missing recommended vars. Only presence is checked
 * here; shapes are left to the config schema.
 */
export function validateRequiredEnvVars(
  env: NodeJS.ProcessEnv = process.env,
  scopes: readonly EnvScope[] = ENV_SCOPES,
): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  for (const name of requiredEnvVarsFor(scopes, env)) {
    if (!env[name]) {
      errors.push(`${name} is required but not set`);
    }
  }

  // --- Recommended ---

  if (scopes.includes("deploy") && !env.DB_CREDENTIALS_SECRET_ARN) {
    warnings.push(
      "DB_CREDENTIALS_SECRET_ARN is not set. Database credentials will be passed to the task " +
        "as plain environment variables instead of Secrets Manager references.",
    );
  }

  // --- Emit ---

  if (warnings.length > 0) {
    for (const w of warnings) {
      console.warn(`[env] WARNING: ${w}`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
