export interface PlaylistEntry {
  id: string,
  title: string,
}

export interface Playlist {
  title: string,
  entries: PlaylistEntry[],
}

export interface PlaylistFetcher {
  fetchPlaylist(playlistId: string): Promise<Playlist>;
}

export interface BatchDownloader {
  downloadEntries(ids: string[], directory: string, extraArguments?: string): Promise<void>;
}

export interface PlaybackOptions {
  shuffle: boolean,
  extraArguments?: string,
}

export interface MediaPlayer {
  play(directory: string, options: PlaybackOptions): Promise<void>;
}

export const playlistUrl = (playlistId: string) =>
  `https://www.youtube.com/playlist?list=${playlistId}`;

export const entryUrl = (id: string) =>
  `https://www.youtube.com/watch?v=${id}`;
