import { join, isAbsolute } from 'path';
import PlaylistError from './PlaylistError';

export const APP_QUALIFIER = 'dev';
export const APP_ORGANIZATION = 'tuneshelf';
export const APP_NAME = 'tuneshelf';

export const YT_DLP_PATH = process.env.YT_DLP_PATH || 'yt-dlp';
export const MPV_PATH = process.env.MPV_PATH || 'mpv';

export interface PathEnvironment {
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  homeDirectory?: string,
}

/**
 * Application cache root, following each platform's convention for
 * per-user cache data. `TUNESHELF_CACHE_DIR` takes precedence everywhere.
 */
export function getCacheRoot({ platform, env, homeDirectory }: PathEnvironment) {
  if (env.TUNESHELF_CACHE_DIR) {
    return env.TUNESHELF_CACHE_DIR;
  }

  if (platform === 'win32') {
    if (!env.LOCALAPPDATA) throw new PlaylistError('NO_HOME_DIRECTORY');
    return join(env.LOCALAPPDATA, APP_ORGANIZATION, APP_NAME, 'cache');
  }

  if (!homeDirectory) {
    throw new PlaylistError('NO_HOME_DIRECTORY');
  }

  if (platform === 'darwin') {
    return join(homeDirectory, 'Library', 'Caches', [APP_QUALIFIER, APP_ORGANIZATION, APP_NAME].join('.'));
  }

  // a relative XDG_CACHE_HOME is invalid and falls back to ~/.cache
  const xdgCacheHome = env.XDG_CACHE_HOME && isAbsolute(env.XDG_CACHE_HOME)
    ? env.XDG_CACHE_HOME
    : join(homeDirectory, '.cache');
  return join(xdgCacheHome, APP_NAME);
}

export function getPlaylistDirectory(playlistId: string, environment: PathEnvironment) {
  return join(getCacheRoot(environment), playlistId);
}
