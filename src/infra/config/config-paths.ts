import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LIFT_DISPATCH_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    return override;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(), '.config');
  return path.join(baseDir, 'lift-dispatch');
}

export function ensureConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const configDir = getConfigDir(env);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}
