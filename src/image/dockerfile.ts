import { DEFAULT_SUBSTITUTIONS, type EnvSubstitution, referencedArgs, renderSedScript } from "./env-substitution.js";

const ARCHIVE_FILE_PATTERN = /^[\w.-]+\.(zip|tar|tar\.gz|tgz|tar\.bz2|tar\.xz)$/;
const ARCHIVE_FOLDER_PATTERN = /^[\w.-]+$/;
const BASE_IMAGE_PATTERN = /^[\w.\-/]+(:[\w.-]+)?(@sha256:[a-f0-9]{64})?$/;

/** Document root the application is served from. */
export const WEB_ROOT = "/var/www/html";

/** Directory of the build context the source archive is staged in. */
export const STAGED_ARCHIVE_DIR = "source";

/** Apache with mod_php and the extensions a Laravel application needs. */
export const DEFAULT_PACKAGES: readonly string[] = [
  "apache2",
  "php",
  "libapache2-mod-php",
  "php-mysql",
  "php-mbstring",
  "php-xml",
  "php-curl",
  "php-zip",
  "php-bcmath",
  "unzip",
  "curl",
  "ca-certificates",
];

export interface DockerfileOptions {
  baseImage: string;
  archiveFile: string;
  archiveFolder: string;
  packages?: readonly string[];
  substitutions?: readonly EnvSubstitution[];
}

/** Build arguments the rendered Dockerfile declares, in order of first use. */
export function dockerfileArgs(substitutions: readonly EnvSubstitution[] = DEFAULT_SUBSTITUTIONS): string[] {
  const names: string[] = [];
  for (const sub of substitutions) {
    for (const name of referencedArgs(sub.template)) {
      if (!names.includes(name)) names.push(name);
    }
  }
  return names;
}

function extractCommand(archiveFile: string): string {
  return archiveFile.endsWith(".zip") ? `unzip -q ${archiveFile}` : `tar -xf ${archiveFile}`;
}

/**
 * Render the Dockerfile for the application image.
 *
 * The source archive is downloaded on the host and copied in, so no
 * credential is ever passed to the build. Only the non-secret build
 * arguments the `.env` substitutions reference are declared.
 */
export function renderDockerfile(options: DockerfileOptions): string {
  const { baseImage, archiveFile, archiveFolder } = options;
  if (!BASE_IMAGE_PATTERN.test(baseImage)) {
    throw new Error(`Invalid baseImage: ${baseImage}`);
  }
  if (!ARCHIVE_FILE_PATTERN.test(archiveFile)) {
    throw new Error(`Invalid archiveFile: ${archiveFile}`);
  }
  if (!ARCHIVE_FOLDER_PATTERN.test(archiveFolder) || archiveFolder === "." || archiveFolder === "..") {
    throw new Error(`Invalid archiveFolder: ${archiveFolder}`);
  }

  const packages = options.packages ?? DEFAULT_PACKAGES;
  const substitutions = options.substitutions ?? DEFAULT_SUBSTITUTIONS;
  const args = dockerfileArgs(substitutions);

  const lines: string[] = [`FROM ${baseImage}`, ""];
  for (const name of args) lines.push(`ARG ${name}`);
  if (args.length > 0) lines.push("");

  lines.push(
    "ENV DEBIAN_FRONTEND=noninteractive",
    "",
    "RUN apt-get update \\",
    ` && apt-get install -y --no-install-recommends ${packages.join(" ")} \\`,
    " && rm -rf /var/lib/apt/lists/*",
    "",
    `COPY ${STAGED_ARCHIVE_DIR}/${archiveFile} /tmp/${archiveFile}`,
    "RUN cd /tmp \\",
    ` && ${extractCommand(archiveFile)} \\`,
    ` && cp -r /tmp/${archiveFolder}/. ${WEB_ROOT}/ \\`,
    ` && rm -rf /tmp/${archiveFile} /tmp/${archiveFolder}`,
    "",
    `WORKDIR ${WEB_ROOT}`,
    "RUN [ -f .env ] || cp .env.example .env",
  );
  for (const sub of substitutions) {
    lines.push(`RUN sed -i "${renderSedScript(sub)}" .env`);
  }

  lines.push(
    "",
    `RUN chmod -R 777 ${WEB_ROOT} \\`,
    ` && chmod -R 777 ${WEB_ROOT}/storage`,
    `RUN sed -i 's|DocumentRoot ${WEB_ROOT}$|DocumentRoot ${WEB_ROOT}/public|' /etc/apache2/sites-available/000-default.conf \\`,
    " && a2enmod rewrite",
    "",
    "EXPOSE 80 3306",
    'CMD ["apache2ctl", "-D", "FOREGROUND"]',
    "",
  );

  return lines.join("\n");
}
