import type Docker from "dockerode";

export class DockerBuildError extends Error {
  constructor(
    public readonly operation: string,
    public readonly daemonMessage: string,
  ) {
    super(`Docker ${operation} failed: ${daemonMessage}`);
    this.name = "DockerBuildError";
  }
}

interface ErrorEvent {
  error: string;
  errorDetail?: { message?: string };
}

function isErrorEvent(event: unknown): event is ErrorEvent {
  return (
    typeof event === "object" &&
    event !== null &&
    "error" in event &&
    typeof event.error === "string"
  );
}

/**
 * Wait for a build or push stream to finish.
 *
 * The daemon reports failures as `{ error, errorDetail }` events inside a
 * stream that otherwise ends normally, so the collected output is scanned too.
 */
export function followProgress(
  docker: Docker,
  stream: NodeJS.ReadableStream,
  operation: string,
  onEvent?: (event: unknown) => void,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    docker.modem.followProgress(
      stream,
      (err: Error | null, output: unknown[]) => {
        if (err) {
          reject(new DockerBuildError(operation, err.message));
          return;
        }
        const failure = (output ?? []).find(isErrorEvent);
        if (failure) {
          reject(new DockerBuildError(operation, failure.errorDetail?.message ?? failure.error));
          return;
        }
        resolve();
      },
      onEvent,
    );
  });
}
