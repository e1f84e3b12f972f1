import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { getPlaylistDirectory, PathEnvironment } from '../shared/paths';
import PlaylistError, { describeError } from '../shared/PlaylistError';
import { BatchDownloader, MediaPlayer, PlaylistFetcher } from '../shared/playlist';
import { createLogger, Logger, noopLogger } from '../shared/util';
import extractPlaylistId from './extractPlaylistId';
import reconcilePlaylist from './reconcilePlaylist';

export interface PlayPlaylistOptions {
  url: string,
  verbose: boolean,
  refresh: boolean,
  shuffle: boolean,
  ytDlpArguments?: string,
  mpvArguments?: string,
}

export interface PlayPlaylistCollaborators {
  fetcher: PlaylistFetcher,
  downloader: BatchDownloader,
  player: MediaPlayer,
  environment: PathEnvironment,
  log?: Logger,
}

// os.homedir() throws when neither $HOME nor the passwd entry is usable
const resolveHomeDirectory = () => {
  try {
    return homedir() || undefined;
  } catch {
    return undefined;
  }
};

export const processEnvironment = (): PathEnvironment => ({
  platform: process.platform,
  env: process.env,
  homeDirectory: resolveHomeDirectory(),
});

async function updatePlaylist(
  playlistId: string,
  directory: string,
  options: PlayPlaylistOptions,
  { fetcher, downloader, log }: PlayPlaylistCollaborators,
  debug: Logger,
) {
  const playlist = await fetcher.fetchPlaylist(playlistId);
  debug('Fetched Playlist Data:', JSON.stringify(playlist));

  await reconcilePlaylist(playlist.entries, directory, downloader, {
    extraArguments: options.ytDlpArguments,
    log,
  });
}

/**
 * One pass of the cache state machine: an uncached playlist is created and
 * filled, a cached one is refreshed only on request, and playback follows
 * either way.
 */
export default async function playPlaylist(
  options: PlayPlaylistOptions,
  collaborators: PlayPlaylistCollaborators,
) {
  const debug = options.verbose ? createLogger('Main', 'debug') : noopLogger;

  const playlistId = extractPlaylistId(options.url);
  debug('Found Playlist ID:', playlistId);

  const directory = getPlaylistDirectory(playlistId, collaborators.environment);
  debug('Using Cache Directory:', directory);

  if (!existsSync(directory)) {
    try {
      mkdirSync(directory, { recursive: true });
    } catch (err) {
      throw new PlaylistError('CACHE_DIR_CREATION_FAILED', `${directory}: ${describeError(err)}`, err);
    }
    await updatePlaylist(playlistId, directory, options, collaborators, debug);
  } else if (options.refresh) {
    await updatePlaylist(playlistId, directory, options, collaborators, debug);
  }

  await collaborators.player.play(directory, {
    shuffle: options.shuffle,
    extraArguments: options.mpvArguments,
  });

  return directory;
}
