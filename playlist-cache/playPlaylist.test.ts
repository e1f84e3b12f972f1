import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import playPlaylist, { PlayPlaylistOptions } from './playPlaylist';
import PlaylistError from '../shared/PlaylistError';
import { Playlist } from '../shared/playlist';

const PLAYLIST_URL = 'https://www.youtube.com/playlist?list=PLmix';

const playlist: Playlist = {
  title: 'Morning Mix',
  entries: [{ id: 'a1', title: 'One' }, { id: 'b2', title: 'Two' }],
};

const options = (overrides: Partial<PlayPlaylistOptions> = {}): PlayPlaylistOptions => ({
  url: PLAYLIST_URL,
  verbose: false,
  refresh: false,
  shuffle: false,
  ...overrides,
});

describe('playPlaylist', () => {
  let cacheRoot: string;
  let directory: string;

  const collaborators = () => ({
    fetcher: { fetchPlaylist: vi.fn(async (_playlistId: string) => playlist) },
    downloader: { downloadEntries: vi.fn(async () => {}) },
    player: { play: vi.fn(async () => {}) },
    environment: { platform: 'linux' as const, env: { TUNESHELF_CACHE_DIR: cacheRoot } },
    log: vi.fn(),
  });

  beforeEach(() => {
    cacheRoot = mkdtempSync(join(tmpdir(), 'tuneshelf-root-'));
    directory = join(cacheRoot, 'PLmix');
  });

  afterEach(() => {
    rmSync(cacheRoot, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('creates, fills and plays an uncached playlist', async () => {
    const deps = collaborators();

    await expect(playPlaylist(options(), deps)).resolves.toBe(directory);

    expect(existsSync(directory)).toBe(true);
    expect(deps.fetcher.fetchPlaylist).toHaveBeenCalledWith('PLmix');
    expect(deps.downloader.downloadEntries).toHaveBeenCalledWith(['a1', 'b2'], directory, undefined);
    expect(deps.player.play).toHaveBeenCalledWith(directory, { shuffle: false, extraArguments: undefined });
  });

  it('plays a cached playlist without fetching', async () => {
    mkdirSync(directory);
    writeFileSync(join(directory, 'stale.mp3'), '');
    const deps = collaborators();

    await playPlaylist(options(), deps);

    expect(deps.fetcher.fetchPlaylist).not.toHaveBeenCalled();
    expect(deps.downloader.downloadEntries).not.toHaveBeenCalled();
    expect(existsSync(join(directory, 'stale.mp3'))).toBe(true);
    expect(deps.player.play).toHaveBeenCalledTimes(1);
  });

  it('reconciles a cached playlist when asked to refresh', async () => {
    mkdirSync(directory);
    writeFileSync(join(directory, 'stale.mp3'), '');
    writeFileSync(join(directory, 'One [a1].opus'), '');
    const deps = collaborators();

    await playPlaylist(options({ refresh: true }), deps);

    expect(deps.fetcher.fetchPlaylist).toHaveBeenCalledWith('PLmix');
    expect(existsSync(join(directory, 'stale.mp3'))).toBe(false);
    expect(deps.downloader.downloadEntries).toHaveBeenCalledWith(['b2'], directory, undefined);
    expect(deps.player.play).toHaveBeenCalledTimes(1);
  });

  it('passes extra arguments and shuffle through', async () => {
    const deps = collaborators();

    await playPlaylist(options({
      shuffle: true,
      ytDlpArguments: '--audio-format mp3',
      mpvArguments: '--volume=50',
    }), deps);

    expect(deps.downloader.downloadEntries).toHaveBeenCalledWith(['a1', 'b2'], directory, '--audio-format mp3');
    expect(deps.player.play).toHaveBeenCalledWith(directory, { shuffle: true, extraArguments: '--volume=50' });
  });

  it('stops before anything else on a bad URL', async () => {
    const deps = collaborators();

    await expect(playPlaylist(options({ url: 'https://www.youtube.com/watch?v=a1' }), deps))
      .rejects.toThrow("Could not find a 'list' parameter in the URL");
    expect(deps.fetcher.fetchPlaylist).not.toHaveBeenCalled();
    expect(deps.player.play).not.toHaveBeenCalled();
  });

  it('does not play when the fetch fails, and keeps the new directory', async () => {
    const deps = collaborators();
    deps.fetcher.fetchPlaylist.mockRejectedValueOnce(new PlaylistError('DOWNLOADER_OUTPUT_MALFORMED'));

    await expect(playPlaylist(options(), deps)).rejects.toThrow('yt-dlp output is not a playlist');
    expect(existsSync(directory)).toBe(true);
    expect(deps.player.play).not.toHaveBeenCalled();
  });

  it('reports a cache directory that cannot be created', async () => {
    const blocker = join(cacheRoot, 'not-a-directory');
    writeFileSync(blocker, '');
    const deps = collaborators();
    deps.environment.env.TUNESHELF_CACHE_DIR = blocker;

    const err = await playPlaylist(options(), deps).then(() => undefined, (e: unknown) => e);

    expect(err).toBeInstanceOf(PlaylistError);
    expect(err instanceof PlaylistError && err.type).toBe('CACHE_DIR_CREATION_FAILED');
    expect(deps.fetcher.fetchPlaylist).not.toHaveBeenCalled();
  });

  it('logs lookup details only when verbose', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    await playPlaylist(options(), collaborators());
    expect(debug).not.toHaveBeenCalled();

    await playPlaylist(options({ verbose: true }), collaborators());
    expect(debug).toHaveBeenCalledWith(expect.any(String), '[Main]', 'Found Playlist ID:', 'PLmix');
    expect(debug).toHaveBeenCalledWith(expect.any(String), '[Main]', 'Using Cache Directory:', directory);
  });
});
