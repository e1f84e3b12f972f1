import { spawn } from 'child_process';
import * as Paths from '../../shared/paths';
import PlaylistError, { describeError } from '../../shared/PlaylistError';
import { createLogger, splitArguments } from '../../shared/util';
import {
  BatchDownloader,
  Playlist,
  PlaylistEntry,
  PlaylistFetcher,
  entryUrl,
  playlistUrl,
} from '../../shared/playlist';

export const OUTPUT_TEMPLATE = '%(title)s [%(id)s].%(ext)s';

export const fetchArguments = (playlistId: string) =>
  ['--flat-playlist', '-J', playlistUrl(playlistId)];

export const batchArguments = (extraArguments?: string) => [
  '--batch-file', '-',
  '-o', OUTPUT_TEMPLATE,
  '-x',
  ...splitArguments(extraArguments),
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPlaylistEntry = (value: unknown): value is PlaylistEntry =>
  isRecord(value) && typeof value.id === 'string' && typeof value.title === 'string';

const isPlaylist = (value: unknown): value is Playlist =>
  isRecord(value) &&
  typeof value.title === 'string' &&
  Array.isArray(value.entries) &&
  value.entries.every(isPlaylistEntry);

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse the JSON document printed by `yt-dlp --flat-playlist -J`.
 * Only the playlist title and each entry's id and title are kept.
 */
export function parsePlaylistOutput(output: Uint8Array): Playlist {
  let text: string;
  try {
    text = utf8.decode(output);
  } catch (err) {
    throw new PlaylistError('DOWNLOADER_OUTPUT_NOT_UTF8', undefined, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new PlaylistError('DOWNLOADER_OUTPUT_MALFORMED', describeError(err), err);
  }

  if (!isPlaylist(json)) {
    throw new PlaylistError('DOWNLOADER_OUTPUT_MALFORMED');
  }

  return {
    title: json.title,
    entries: json.entries.map(({ id, title }) => ({ id, title })),
  };
}

export default class YtDlp implements PlaylistFetcher, BatchDownloader {
  binaryPath: string;

  private log = createLogger('yt-dlp', 'warn');

  constructor(binaryPath = Paths.YT_DLP_PATH) {
    this.binaryPath = binaryPath;
  }

  fetchPlaylist(playlistId: string) {
    return new Promise<Playlist>((resolve, reject) => {
      const cmd = spawn(this.binaryPath, fetchArguments(playlistId), {
        stdio: ['ignore', 'pipe', 'inherit'],
      });
      const chunks: Buffer[] = [];
      cmd.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      cmd.on('error', (err) => {
        reject(new PlaylistError('DOWNLOADER_INVOCATION_FAILED', err.message, err));
      });
      cmd.on('close', (code) => {
        // a failed query is reported as a failed run; whatever it printed is not parsed
        if (code !== 0) {
          return reject(new PlaylistError('DOWNLOADER_INVOCATION_FAILED', `exited with code ${code}`));
        }
        try {
          resolve(parsePlaylistOutput(Buffer.concat(chunks)));
        } catch (err) {
          reject(err);
        }
      });
    });
  }

  downloadEntries(ids: string[], directory: string, extraArguments?: string) {
    return new Promise<void>((resolve, reject) => {
      const cmd = spawn(this.binaryPath, batchArguments(extraArguments), {
        cwd: directory,
        stdio: ['pipe', 'inherit', 'inherit'],
      });
      cmd.on('error', (err) => {
        reject(new PlaylistError('DOWNLOADER_INVOCATION_FAILED', err.message, err));
      });
      cmd.on('close', (code) => {
        if (code === 0) return resolve();
        reject(new PlaylistError('PARTIAL_DOWNLOAD_FAILURE', `exited with code ${code}`));
      });
      // an early exit shows up as EPIPE here; the close handler reports it
      cmd.stdin.on('error', (err) => this.log('stdin closed early:', err.message));
      cmd.stdin.end(ids.map((id) => `${entryUrl(id)}\n`).join(''));
    });
  }
}
