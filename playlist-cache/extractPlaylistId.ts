import PlaylistError, { describeError } from '../shared/PlaylistError';

/**
 * Returns the decoded value of the first `list` query parameter.
 * Any URL carrying one is accepted; the host is not checked.
 */
export default function extractPlaylistId(input: string) {
  let url: URL;
  try {
    url = new URL(input);
  } catch (err) {
    throw new PlaylistError('INVALID_URL', describeError(err), err);
  }

  for (const [parameter, value] of url.searchParams) {
    if (parameter === 'list') {
      // an empty id would resolve to the cache root itself
      if (!value) break;
      return value;
    }
  }

  throw new PlaylistError('MISSING_PLAYLIST_PARAMETER');
}
