import fs from "fs";
import path from "path";
import dotenv from "dotenv";

/**
 * Load `.env` into `process.env`. `DOCENT_ENV_FILE` or `DOTENV_CONFIG_PATH`
 * name the file explicitly; otherwise `./.env`, then `../.env`, relative to
 * `cwd`. Returns the file that was loaded, if any.
 */
export function loadEnv(cwd: string = process.cwd()): string | undefined {
  const explicitPath = process.env.DOCENT_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return explicitPath;
  }

  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return candidate;
    }
  }
  return undefined;
}
