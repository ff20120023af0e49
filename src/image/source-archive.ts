import { writeFile } from "node:fs/promises";
import { logger } from "../config/logger.js";

export class GitHubArchiveError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly url: string,
  ) {
    super(`GitHub archive download failed with ${statusCode}: ${url}`);
    this.name = "GitHubArchiveError";
  }
}

/**
 * Downloads source archives from GitHub (`/<owner>/<repo>/archive/<file>`)
 * with a personal access token. The token stays on the build host.
 */
export class GitHubArchiveClient {
  private readonly baseUrl = "https://github.com";
  private readonly username: string;
  private readonly token: string;

  constructor(username: string, token: string) {
    this.username = username;
    this.token = token;
  }

  archiveUrl(owner: string, repo: string, file: string): string {
    return `${this.baseUrl}/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/archive/${file}`;
  }

  /** Download an archive to `destPath`. Returns the number of bytes written. */
  async download(owner: string, repo: string, file: string, destPath: string): Promise<number> {
    const url = this.archiveUrl(owner, repo, file);
    logger.info(`Downloading source archive ${owner}/${repo}@${file}`);

    const res = await fetch(url, {
      method: "GET",
      headers: this.headers(),
      redirect: "follow",
    });
    if (!res.ok) {
      throw new GitHubArchiveError(res.status, url);
    }

    const body = Buffer.from(await res.arrayBuffer());
    await writeFile(destPath, body);
    logger.debug(`Wrote ${body.length} bytes to ${destPath}`);
    return body.length;
  }

  private headers(): Record<string, string> {
    const credentials = Buffer.from(`${this.username}:${this.token}`).toString("base64");
    return {
      Authorization: `Basic ${credentials}`,
      Accept: "application/octet-stream",
    };
  }
}
