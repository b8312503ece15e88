import fs from "fs";

const DOCKER_SECRETS_DIR = "/run/secrets/";

/**
 * Returns the value as-is, or the trimmed file contents when the value
 * points into the Docker secrets directory.
 */
export function resolveSecret(name: string, value: string): string {
  if (!value.startsWith(DOCKER_SECRETS_DIR)) {
    return value;
  }

  try {
    return fs.readFileSync(value, "utf8").trim();
  } catch (err) {
    throw new Error(`${name} points to an unreadable secret file: ${value}`, { cause: err });
  }
}
