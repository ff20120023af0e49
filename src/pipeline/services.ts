import Docker from "dockerode";
import { AwsCli } from "../aws/aws-cli.js";
import type { DeployConfig } from "../config/index.js";
import { ServiceDeployer } from "../deploy/service-deployer.js";
import { DnsExposer } from "../expose/dns-exposer.js";
import { ImageBuilder } from "../image/image-builder.js";
import { GitHubArchiveClient } from "../image/source-archive.js";
import { DataMigrator } from "../migrate/data-migrator.js";
import { RegistryPublisher } from "../registry/registry-publisher.js";
import type { PipelineDeps } from "./deploy-pipeline.js";

/**
 * Wire the real clients for one run. Nothing connects at construction time:
 * the Docker socket, the AWS CLI and the database are first touched by the
 * step that needs them.
 */
export function createPipelineDeps(config: DeployConfig): PipelineDeps {
  const docker = new Docker({ socketPath: config.image.dockerSocket });
  const aws = new AwsCli(config.aws.region);
  const archiveClient = new GitHubArchiveClient(config.source.username, config.source.token);

  return {
    imageBuilder: new ImageBuilder(docker, archiveClient),
    registryPublisher: new RegistryPublisher(docker, aws),
    serviceDeployer: new ServiceDeployer(aws),
    dataMigrator: new DataMigrator(),
    dnsExposer: new DnsExposer(aws),
  };
}
