export type PlaylistErrorType =
  'INVALID_URL' |
  'MISSING_PLAYLIST_PARAMETER' |
  'NO_HOME_DIRECTORY' |
  'CACHE_DIR_CREATION_FAILED' |
  'DOWNLOADER_INVOCATION_FAILED' |
  'DOWNLOADER_OUTPUT_NOT_UTF8' |
  'DOWNLOADER_OUTPUT_MALFORMED' |
  'FILE_SYSTEM_ERROR' |
  'PARTIAL_DOWNLOAD_FAILURE' |
  'PLAYER_INVOCATION_FAILED';

const DEFAULT_MESSAGES: Record<PlaylistErrorType, string> = {
  INVALID_URL: 'Invalid URL format',
  MISSING_PLAYLIST_PARAMETER: "Could not find a 'list' parameter in the URL",
  NO_HOME_DIRECTORY: 'Home directory could not be found',
  CACHE_DIR_CREATION_FAILED: 'Failed to create cache directory',
  DOWNLOADER_INVOCATION_FAILED: 'yt-dlp could not be run',
  DOWNLOADER_OUTPUT_NOT_UTF8: 'yt-dlp output is not valid UTF-8',
  DOWNLOADER_OUTPUT_MALFORMED: 'yt-dlp output is not a playlist',
  FILE_SYSTEM_ERROR: 'Cache directory could not be updated',
  PARTIAL_DOWNLOAD_FAILURE: 'yt-dlp failed to download some files',
  PLAYER_INVOCATION_FAILED: 'mpv could not be run',
};

export default class PlaylistError extends Error {
  type: PlaylistErrorType;
  constructor(type: PlaylistErrorType, detail?: string, cause?: unknown) {
    super(detail ? `${DEFAULT_MESSAGES[type]}: ${detail}` : DEFAULT_MESSAGES[type], { cause });
    this.name = 'PlaylistError';
    this.type = type;
  }
}

export const describeError = (err: unknown) =>
  err instanceof Error ? err.message : String(err);
