import { type DeployConfig, loadConfig } from "../config/index.js";

/** A complete environment with placeholder values. */
export const TEST_ENV: Readonly<Record<string, string>> = {
  NODE_ENV: "test",
  GITHUB_PAT: "test-token",
  GITHUB_USERNAME: "octo",
  GITHUB_REPOSITORY: "shop",
  SOURCE_ARCHIVE_FILE: "main.zip",
  SOURCE_ARCHIVE_FOLDER: "shop-main",
  DOMAIN_NAME: "example.com",
  RDS_ENDPOINT: "db.test.internal",
  RDS_DATABASE: "shop",
  RDS_USERNAME: "shop_user",
  RDS_PASSWORD: "test-password",
  AWS_REGION: "us-east-1",
  AWS_ACCOUNT_ID: "123456789012",
  ECS_CLUSTER: "shop-cluster",
  ECS_SERVICE: "shop-web",
  ECS_EXECUTION_ROLE_ARN: "arn:aws:iam::123456789012:role/ecsTaskExecutionRole",
  ECS_SUBNETS: "subnet-private-a,subnet-private-b",
  ECS_SECURITY_GROUPS: "sg-web",
  LOAD_BALANCER_ARN: "arn:aws:elasticloadbalancing:us-east-1:123456789012:loadbalancer/app/shop-alb/50dc6c495c0c9188",
  TARGET_GROUP_ARN: "arn:aws:elasticloadbalancing:us-east-1:123456789012:targetgroup/shop-tg/943f017f100becff",
  HOSTED_ZONE_ID: "Z0TESTZONE",
};

export function testConfig(overrides: Record<string, string> = {}): DeployConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}
