/**
 * Playlist formats the player understands, and the audio types a browser can
 * play natively.
 */

export type PlaylistFormat = 'm3u' | 'm3u8' | 'pls';

/** One line of a playlist before it is checked against the served tree. */
export interface PlaylistItem {
  /** As written: a URL, or a path relative to the playlist or absolute. */
  readonly location: string;
  readonly title: string | null;
  /** Seconds; `null` when unknown. */
  readonly duration: number | null;
}

const AUDIO_MIMETYPES: ReadonlyMap<string, string> = new Map([
  ['mp3', 'audio/mpeg'],
  ['ogg', 'audio/ogg'],
  ['wav', 'audio/wav'],
]);

const PLAYLIST_FORMATS: ReadonlyMap<string, PlaylistFormat> = new Map<string, PlaylistFormat>([
  ['m3u', 'm3u'],
  ['m3u8', 'm3u8'],
  ['pls', 'pls'],
]);

function extensionOf(location: string): string {
  const name = location.split(/[\\/]/).pop() ?? '';
  const dot = name.lastIndexOf('.');
  return dot < 0 ? '' : name.slice(dot + 1).toLowerCase();
}

export function audioMimetype(name: string): string | null {
  return AUDIO_MIMETYPES.get(extensionOf(name)) ?? null;
}

/** Query strings and fragments are not part of a stream's name. */
export function remoteAudioMimetype(url: string): string | null {
  return audioMimetype(url.replace(/[?#].*$/, ''));
}

export function playlistFormat(name: string): PlaylistFormat | null {
  return PLAYLIST_FORMATS.get(extensionOf(name)) ?? null;
}

export function isRemoteLocation(location: string): boolean {
  return location.includes('://');
}

/**
 * Decodes a playlist file. `.m3u` is ASCII by definition and `.m3u8` is
 * UTF-8; undecodable bytes become `_`. `.pls` is read as UTF-8.
 */
export function decodePlaylist(format: PlaylistFormat, bytes: Buffer): string {
  if (format === 'm3u') {
    return bytes.toString('latin1').replace(/[\u0080-\u00ff]/g, '_');
  }
  return bytes.toString('utf8').replace(/\uFFFD/g, '_');
}

export function parsePlaylist(format: PlaylistFormat, text: string): PlaylistItem[] {
  return format === 'pls' ? parsePls(text) : parseM3u(text);
}

/**
 * Extended M3U: `#EXTINF:<seconds>,<title>` describes the next location;
 * other `#` lines are comments. A duration of `-1` means unknown.
 */
export function parseM3u(text: string): PlaylistItem[] {
  const items: PlaylistItem[] = [];
  let title: string | null = null;
  let duration: number | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/^\uFEFF/, '').trim();
    if (line === '') continue;

    if (line.startsWith('#EXTINF:')) {
      const info = line.slice('#EXTINF:'.length);
      const comma = info.indexOf(',');
      duration = parseDuration(comma < 0 ? info : info.slice(0, comma));
      title = comma < 0 ? null : info.slice(comma + 1).trim() || null;
      continue;
    }
    if (line.startsWith('#')) continue;

    items.push({ location: line, title, duration });
    title = null;
    duration = null;
  }
  return items;
}

/**
 * PLS: an INI file whose `[playlist]` section holds `File<n>`, `Title<n>` and
 * `Length<n>`. With `NumberOfEntries`, gaps in the numbering are skipped;
 * without it, reading stops at the first missing `File<n>`.
 */
export function parsePls(text: string): PlaylistItem[] {
  const section = readIniSection(text, 'playlist');
  const declared = parseInteger(section.get('numberofentries') ?? '');
  const numbered = [...section.keys()]
    .map((key) => /^file(\d+)$/.exec(key)?.[1])
    .filter((digits): digits is string => digits !== undefined)
    .map((digits) => Number.parseInt(digits, 10))
    .sort((a, b) => a - b);

  const items: PlaylistItem[] = [];
  for (const [index, n] of numbered.entries()) {
    if (declared === null && n !== index + 1) break;
    if (declared !== null && (n < 1 || n > declared)) continue;

    const location = section.get(`file${n}`);
    if (!location) {
      if (declared === null) break;
      continue;
    }
    items.push({
      location,
      title: section.get(`title${n}`) || null,
      duration: parseDuration(section.get(`length${n}`) ?? ''),
    });
  }
  return items;
}

/** Keys are lowercased; later duplicates win. */
function readIniSection(text: string, wanted: string): Map<string, string> {
  const values = new Map<string, string>();
  let current: string | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/^\uFEFF/, '').trim();
    if (line === '' || line.startsWith(';') || line.startsWith('#')) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = (header[1] ?? '').trim().toLowerCase();
      continue;
    }
    if (current !== wanted) continue;

    const separator = line.search(/[=:]/);
    if (separator <= 0) continue;
    values.set(line.slice(0, separator).trim().toLowerCase(), line.slice(separator + 1).trim());
  }
  return values;
}

function parseInteger(raw: string): number | null {
  return /^-?\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : null;
}

function parseDuration(raw: string): number | null {
  const seconds = parseInteger(raw);
  return seconds === null || seconds < 0 ? null : seconds;
}
