import { Command } from 'commander';
import { version, description } from '../package.json';
import { PlayPlaylistOptions } from './playPlaylist';

type CliOptions = {
  verbose: boolean,
  refresh: boolean,
  shuffle: boolean,
  ytDlpArguments?: string,
  mpvArguments?: string,
};

export function createProgram() {
  return new Command()
    .name('tuneshelf')
    .description(description)
    .version(version)
    .argument('<url>', 'URL to play from')
    .option('-v, --verbose', 'Use verbose output', false)
    .option('-r, --refresh', 'Refresh cached songs', false)
    .option('-s, --shuffle', 'Shuffle playback', false)
    .option('--yt-dlp-arguments <string>', 'Custom yt-dlp arguments')
    .option('--mpv-arguments <string>', 'Custom mpv arguments');
}

export function parseArguments(argv: string[], program = createProgram()): PlayPlaylistOptions {
  program.parse(argv, { from: 'user' });
  const [url] = program.args;
  return { url, ...program.opts<CliOptions>() };
}
