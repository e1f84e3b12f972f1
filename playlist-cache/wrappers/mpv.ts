import { spawn } from 'child_process';
import * as Paths from '../../shared/paths';
import PlaylistError from '../../shared/PlaylistError';
import { splitArguments } from '../../shared/util';
import { MediaPlayer, PlaybackOptions } from '../../shared/playlist';

export const playerArguments = ({ shuffle, extraArguments }: PlaybackOptions) => [
  '--no-video',
  ...(shuffle ? ['--shuffle'] : []),
  ...splitArguments(extraArguments),
  '.',
];

export default class Mpv implements MediaPlayer {
  binaryPath: string;

  constructor(binaryPath = Paths.MPV_PATH) {
    this.binaryPath = binaryPath;
  }

  // mpv exits non-zero when the user quits early, so the status is not checked
  play(directory: string, options: PlaybackOptions) {
    return new Promise<void>((resolve, reject) => {
      const cmd = spawn(this.binaryPath, playerArguments(options), {
        cwd: directory,
        stdio: 'inherit',
      });
      cmd.on('error', (err) => {
        reject(new PlaylistError('PLAYER_INVOCATION_FAILED', err.message, err));
      });
      cmd.on('close', () => resolve());
    });
  }
}
