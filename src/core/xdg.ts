import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'paddock-merge';

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim().length > 0 ? value : null;
}

function getHome(): string {
  const home = nonEmpty(process.env.HOME) ?? os.homedir().trim();
  if (home.length > 0) return home;
  throw new Error('Unable to determine a home directory for merge data.');
}

/** Run output and logs. */
export function getDataDir(appName: string = APP_NAME): string {
  if (process.platform === 'win32') {
    const base =
      nonEmpty(process.env.LOCALAPPDATA) ??
      nonEmpty(process.env.APPDATA) ??
      path.join(getHome(), 'AppData', 'Local');
    return path.join(base, appName, 'data');
  }
  const xdg = nonEmpty(process.env.XDG_DATA_HOME);
  if (xdg) return path.join(xdg, appName, 'data');
  return path.join(getHome(), '.local', 'share', appName, 'data');
}

export function getConfigDir(appName: string = APP_NAME): string {
  if (process.platform === 'win32') {
    const base =
      nonEmpty(process.env.APPDATA) ?? path.join(getHome(), 'AppData', 'Roaming');
    return path.join(base, appName);
  }
  const xdg = nonEmpty(process.env.XDG_CONFIG_HOME);
  if (xdg) return path.join(xdg, appName);
  return path.join(getHome(), '.config', appName);
}

export function getLogDir(appName: string = APP_NAME): string {
  return path.join(getDataDir(appName), 'logs');
}
