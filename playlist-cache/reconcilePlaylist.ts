import { readdirSync, lstatSync, unlinkSync } from 'fs';
import { join } from 'path';
import PlaylistError, { describeError } from '../shared/PlaylistError';
import { BatchDownloader, PlaylistEntry } from '../shared/playlist';
import { createLogger, Logger } from '../shared/util';

export interface ReconcileOptions {
  extraArguments?: string,
  log?: Logger,
}

export interface ReconcileResult {
  deleted: string[],
  found: string[],
  missing: string[],
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const decodeFilename = (name: Buffer) => {
  try {
    return utf8.decode(name);
  } catch {
    return undefined;
  }
};

// Names that are not valid UTF-8 cannot hold a playlist id and are left untouched
function listFiles(directory: string) {
  const filenames: string[] = [];
  try {
    for (const name of readdirSync(directory, { encoding: 'buffer' })) {
      const filename = decodeFilename(name);
      if (filename !== undefined && lstatSync(join(directory, filename)).isFile()) {
        filenames.push(filename);
      }
    }
  } catch (err) {
    throw new PlaylistError('FILE_SYSTEM_ERROR', describeError(err), err);
  }
  return filenames;
}

/**
 * Bring a cache directory in line with the playlist's current entries.
 *
 * A file belongs to an entry when its name contains the entry's id anywhere;
 * the first matching id wins. Files that match no entry are deleted, then every
 * entry without a file is handed to the downloader in one batch, in playlist
 * order. Nothing is rolled back if the batch fails.
 */
export default async function reconcilePlaylist(
  entries: PlaylistEntry[],
  directory: string,
  downloader: BatchDownloader,
  { extraArguments, log = createLogger('Cache') }: ReconcileOptions = {},
): Promise<ReconcileResult> {
  const validIds = new Set(entries.map((entry) => entry.id));
  const foundIds = new Set<string>();
  const deleted: string[] = [];

  for (const filename of listFiles(directory)) {
    let matchesPlaylist = false;
    for (const id of validIds) {
      if (filename.includes(id)) {
        matchesPlaylist = true;
        foundIds.add(id);
        break;
      }
    }

    if (!matchesPlaylist) {
      const path = join(directory, filename);
      log('Deleting erroneous file:', path);
      try {
        unlinkSync(path);
      } catch (err) {
        throw new PlaylistError('FILE_SYSTEM_ERROR', describeError(err), err);
      }
      deleted.push(filename);
    }
  }

  const missing = [...new Set(entries.map((entry) => entry.id))]
    .filter((id) => !foundIds.has(id));

  if (missing.length > 0) {
    log(`Downloading ${missing.length} missing songs...`);
    await downloader.downloadEntries(missing, directory, extraArguments);
  }

  return { deleted, found: [...foundIds], missing };
}
