import type Docker from "dockerode";
import { z } from "zod";
import type { IAwsCli } from "../aws/aws-cli.js";
import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { followProgress } from "../image/docker-progress.js";
import { localImageTag } from "../image/image-builder.js";

const authorizationSchema = z.object({
  authorizationData: z
    .array(
      z.object({
        authorizationToken: z.string().min(1),
        proxyEndpoint: z.string().min(1),
      }),
    )
    .nonempty(),
});

export interface RegistryCredentials {
  username: string;
  password: string;
}

export interface PublishResult {
  imageUri: string;
}

/** `<account>.dkr.ecr.<region>.amazonaws.com` */
export function registryHost(accountId: string, region: string): string {
  return `${accountId}.dkr.ecr.${region}.amazonaws.com`;
}

/** Fully qualified repository name without the tag. */
export function remoteRepository(config: DeployConfig): string {
  return `${registryHost(config.aws.accountId, config.aws.region)}/${config.ecr.repository}`;
}

/** `<account>.<registry-host>/<image-name>:<tag>` the task definition references. */
export function imageUri(config: DeployConfig): string {
  return `${remoteRepository(config)}:${config.image.tag}`;
}

/** Decode the base64 `user:password` pair ECR hands out. */
export function decodeAuthorizationToken(token: string): RegistryCredentials {
  const decoded = Buffer.from(token, "base64").toString("utf-8");
  const sep = decoded.indexOf(":");
  if (sep <= 0 || sep === decoded.length - 1) {
    throw new Error("Malformed ECR authorization token");
  }
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/**
 * Pushes the locally built image to ECR: short-lived token, remote tag, push.
 * No retry; a failed push aborts the step.
 */
export class RegistryPublisher {
  constructor(
    private readonly docker: Docker,
    private readonly aws: IAwsCli,
  ) {}

  async publish(config: DeployConfig): Promise<PublishResult> {
    const repo = remoteRepository(config);
    const tag = config.image.tag;
    const uri = `${repo}:${tag}`;

    const auth = await this.aws.run(["ecr", "get-authorization-token"], authorizationSchema);
    const { authorizationToken, proxyEndpoint } = auth.authorizationData[0];
    const credentials = decodeAuthorizationToken(authorizationToken);

    logger.info(`Tagging ${localImageTag(config)} as ${uri}`);
    await this.docker.getImage(localImageTag(config)).tag({ repo, tag });

    logger.info(`Pushing ${uri}`);
    const stream = await this.docker.getImage(uri).push({
      tag,
      authconfig: { ...credentials, serveraddress: proxyEndpoint },
    });
    await followProgress(this.docker, stream, "push");

    logger.info(`Pushed ${uri}`);
    return { imageUri: uri };
  }
}
