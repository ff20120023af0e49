import { describe, expect, it } from "vitest";
import { TEST_ENV } from "../test/config.js";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("maps the environment onto grouped settings", () => {
    const config = loadConfig({ ...TEST_ENV });

    expect(config.source).toEqual({
      token: "test-token",
      username: "octo",
      repository: "shop",
      archiveFile: "main.zip",
      archiveFolder: "shop-main",
    });
    expect(config.db.host).toBe("db.test.internal");
    expect(config.db.name).toBe("shop");
    expect(config.ecs.subnets).toEqual(["subnet-private-a", "subnet-private-b"]);
    expect(config.ecs.securityGroups).toEqual(["sg-web"]);
  });

  it("applies defaults for optional settings", () => {
    const config = loadConfig({ ...TEST_ENV });

    expect(config.app.env).toBe("production");
    expect(config.db.port).toBe(3306);
    expect(config.db.credentialsSecretArn).toBeUndefined();
    expect(config.image).toEqual({
      name: "php-app",
      tag: "latest",
      baseImage: "ubuntu:22.04",
      dockerSocket: "/var/run/docker.sock",
    });
    expect(config.ecs.containerName).toBe("web");
    expect(config.ecs.cpu).toBe(512);
    expect(config.ecs.memory).toBe(1024);
    expect(config.ecs.desiredCount).toBe(2);
    expect(config.ecs.minCapacity).toBe(1);
    expect(config.ecs.maxCapacity).toBe(4);
    expect(config.ecs.targetRequestsPerTarget).toBe(1000);
    expect(config.ecs.waitForStable).toBe(false);
    expect(config.migrate.dir).toBe("./migrations");
    expect(config.logLevel).toBe("info");
  });

  it("defaults the ECR repository to the image name and the task family to the service", () => {
    const config = loadConfig({ ...TEST_ENV, IMAGE_NAME: "storefront" });
    expect(config.ecr.repository).toBe("storefront");
    expect(config.ecs.taskFamily).toBe("shop-web");
  });

  it("keeps explicit ECR repository and task family", () => {
    const config = loadConfig({ ...TEST_ENV, ECR_REPOSITORY: "apps/shop", ECS_TASK_FAMILY: "shop-task" });
    expect(config.ecr.repository).toBe("apps/shop");
    expect(config.ecs.taskFamily).toBe("shop-task");
  });

  it("coerces numeric settings and the stable-wait flag", () => {
    const config = loadConfig({
      ...TEST_ENV,
      RDS_PORT: "3307",
      ECS_TASK_CPU: "1024",
      ECS_MAX_CAPACITY: "10",
      ECS_WAIT_FOR_STABLE: "true",
    });
    expect(config.db.port).toBe(3307);
    expect(config.ecs.cpu).toBe(1024);
    expect(config.ecs.maxCapacity).toBe(10);
    expect(config.ecs.waitForStable).toBe(true);
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ ...TEST_ENV, APP_ENV: "", IMAGE_TAG: "" });
    expect(config.app.env).toBe("production");
    expect(config.image.tag).toBe("latest");
  });

  it("trims and drops empty entries in list settings", () => {
    const config = loadConfig({ ...TEST_ENV, ECS_SUBNETS: " subnet-a , ,subnet-b" });
    expect(config.ecs.subnets).toEqual(["subnet-a", "subnet-b"]);
  });

  it("reads settings a command does not need as empty", () => {
    const config = loadConfig({ RDS_ENDPOINT: "db.test.internal", RDS_DATABASE: "shop" });
    expect(config.db.host).toBe("db.test.internal");
    expect(config.source.token).toBe("");
    expect(config.dns.hostedZoneId).toBe("");
    expect(config.ecs.subnets).toEqual([]);
    expect(config.ecs.taskFamily).toBe("");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ ...TEST_ENV, RDS_PORT: "70000" })).toThrow();
  });

  it("rejects a minimum capacity above the maximum", () => {
    expect(() => loadConfig({ ...TEST_ENV, ECS_MIN_CAPACITY: "5", ECS_MAX_CAPACITY: "2" })).toThrow(
      "ECS_MIN_CAPACITY must not exceed ECS_MAX_CAPACITY",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...TEST_ENV, LOG_LEVEL: "verbose" })).toThrow();
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({ ...TEST_ENV }))).toBe(true);
  });
});
