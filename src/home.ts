import { existsSync } from "fs";
import { dirname, join, resolve } from "path";

export const HOME_DIR_NAME = ".home";
export const HOME_ENV_VAR = "MARKETSCOUT_HOME";
const MAX_ASCENT = 20;

/** Nearest ancestor of `start` holding a `.home/` directory, or `start` itself. */
export function findWorkDir(start: string = process.cwd()): string {
  let dir = resolve(start);
  for (let i = 0; i < MAX_ASCENT; i++) {
    if (existsSync(join(dir, HOME_DIR_NAME))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return resolve(start);
}

/** `MARKETSCOUT_HOME` wins when set; otherwise `.home/` under the discovered work dir. */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const override = (env[HOME_ENV_VAR] ?? "").trim();
  if (override) return resolve(cwd, override);
  return join(findWorkDir(cwd), HOME_DIR_NAME);
}

let _homeDir: string | null = null;

export function getHomeDir(): string {
  if (!_homeDir) {
    _homeDir = resolveHomeDir();
  }
  return _homeDir;
}

export function setHomeDir(dir: string): void {
  _homeDir = dir;
}

export function resetHomeDir(): void {
  _homeDir = null;
}

export function homeFile(name: "config.toml" | ".env"): string {
  return join(getHomeDir(), name);
}
