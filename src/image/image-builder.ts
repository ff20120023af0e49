import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type Docker from "dockerode";
import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { followProgress } from "./docker-progress.js";
import { renderDockerfile, STAGED_ARCHIVE_DIR } from "./dockerfile.js";
import { DEFAULT_SUBSTITUTIONS, type EnvSubstitution, findUnsafeValues } from "./env-substitution.js";
import type { GitHubArchiveClient } from "./source-archive.js";

export interface ImageBuildResult {
  imageTag: string;
  /** Names of the build arguments passed; values are not reported. */
  buildArgs: string[];
}

/** `<image>:<tag>` of the locally built image. */
export function localImageTag(config: DeployConfig): string {
  return `${config.image.name}:${config.image.tag}`;
}

/**
 * Build arguments for the image. Database credentials are deliberately
 * absent: they are injected into the task at container start.
 */
export function imageBuildArgs(config: DeployConfig): Record<string, string> {
  return {
    APP_ENV: config.app.env,
    DOMAIN_NAME: config.app.domainName,
    RDS_ENDPOINT: config.db.host,
    RDS_DATABASE: config.db.name,
  };
}

/**
 * Builds the application image: stages the source archive and Dockerfile in a
 * temporary context, then hands the context to the Docker daemon.
 */
export class ImageBuilder {
  constructor(
    private readonly docker: Docker,
    private readonly archiveClient: Pick<GitHubArchiveClient, "download">,
    private readonly substitutions: readonly EnvSubstitution[] = DEFAULT_SUBSTITUTIONS,
  ) {}

  async build(config: DeployConfig): Promise<ImageBuildResult> {
    const imageTag = localImageTag(config);
    const { archiveFile, archiveFolder, username, repository } = config.source;
    const buildArgs = imageBuildArgs(config);

    for (const key of findUnsafeValues(this.substitutions, buildArgs)) {
      logger.warn(`Value for ${key} contains a character sed interprets; the .env line will be altered or rejected`);
    }

    const contextDir = await mkdtemp(path.join(tmpdir(), "ecs-php-deploy-"));
    try {
      await mkdir(path.join(contextDir, STAGED_ARCHIVE_DIR));
      const archivePath = path.join(contextDir, STAGED_ARCHIVE_DIR, archiveFile);
      await this.archiveClient.download(username, repository, archiveFile, archivePath);

      const dockerfile = renderDockerfile({
        baseImage: config.image.baseImage,
        archiveFile,
        archiveFolder,
        substitutions: this.substitutions,
      });
      await writeFile(path.join(contextDir, "Dockerfile"), dockerfile);

      logger.info(`Building image ${imageTag} from ${config.image.baseImage}`, {
        buildArgs: Object.keys(buildArgs),
      });
      const stream = await this.docker.buildImage(
        { context: contextDir, src: ["Dockerfile", `${STAGED_ARCHIVE_DIR}/${archiveFile}`] },
        { t: imageTag, buildargs: buildArgs, rm: true },
      );
      await followProgress(this.docker, stream, "build", (event) => {
        if (typeof event === "object" && event !== null && "stream" in event && typeof event.stream === "string") {
          const line = event.stream.trim();
          if (line) logger.debug(line);
        }
      });

      logger.info(`Built image ${imageTag}`);
      return { imageTag, buildArgs: Object.keys(buildArgs) };
    } finally {
      await rm(contextDir, { recursive: true, force: true });
    }
  }
}
