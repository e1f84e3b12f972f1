import { describeError } from '../shared/PlaylistError';
import { parseArguments } from './cli';
import playPlaylist, { PlayPlaylistCollaborators, processEnvironment } from './playPlaylist';
import YtDlp from './wrappers/yt-dlp';
import Mpv from './wrappers/mpv';

export function defaultCollaborators(): PlayPlaylistCollaborators {
  const ytDlp = new YtDlp();
  return {
    fetcher: ytDlp,
    downloader: ytDlp,
    player: new Mpv(),
    environment: processEnvironment(),
  };
}

export async function run(argv: string[], collaborators = defaultCollaborators()) {
  await playPlaylist(parseArguments(argv), collaborators);
}

export function reportFailure(err: unknown, exit: (code: number) => void = (code) => process.exit(code)) {
  console.error(`Error: ${describeError(err)}`);
  exit(1);
}
