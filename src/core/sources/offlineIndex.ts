import readline from 'readline';
import zlib from 'zlib';
import fs from 'fs-extra';
import { OfflineIndexError } from '../errors';
import { createLogger } from '../log';
import { isGzipPath } from '../paths';
import { isCatalogId } from './payload';

export interface OfflineEntry {
  identifier: string;
  /** Term list normalized to ",t1,t2,...,tn," without spaces. */
  line: string;
}

export interface OfflineIndex {
  strippedPath: string;
  entries: OfflineEntry[];
  names: Map<string, string>;
  scanned: number;
}

export interface LoadOfflineIndexOptions {
  strippedPath: string;
  namesPath?: string;
  /** Stop reading the stripped file after this many lines. */
  maxScan?: number;
}

const log = createLogger({ component: 'sources', kind: 'offline_index' });

function openLines(file: string): readline.Interface {
  const raw = fs.createReadStream(file);
  const input = isGzipPath(file) ? raw.pipe(zlib.createGunzip()) : raw;
  raw.on('error', (e) => input.destroy(e));
  return readline.createInterface({ input, crlfDelay: Infinity });
}

export function normalizeTermLine(rest: string): string {
  let line = rest.replace(/\s+/g, '');
  if (!line.startsWith(',')) line = `,${line}`;
  if (!line.endsWith(',')) line = `${line},`;
  return line;
}

/**
 * "A000045 ,0,1,1,2,3,5," -> entry, or null for comments and junk.
 */
export function parseStrippedLine(raw: string): OfflineEntry | null {
  if (!raw || raw.startsWith('#')) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const m = /^(\S+)\s+(.+)$/.exec(trimmed);
  if (!m) return null;
  const identifier = m[1] ?? '';
  const rest = m[2] ?? '';
  if (!isCatalogId(identifier)) return null;
  return { identifier, line: normalizeTermLine(rest) };
}

export function parseNamesLine(raw: string): [string, string] | null {
  if (!raw || raw.startsWith('#')) return null;
  const trimmed = raw.trim();
  const space = trimmed.indexOf(' ');
  if (space < 0) return null;
  const identifier = trimmed.slice(0, space).trim();
  const name = trimmed.slice(space + 1).trim();
  if (!isCatalogId(identifier)) return null;
  return [identifier, name];
}

export async function loadNames(namesPath: string): Promise<Map<string, string>> {
  const names = new Map<string, string>();
  for await (const raw of openLines(namesPath)) {
    const parsed = parseNamesLine(raw);
    if (parsed) names.set(parsed[0], parsed[1]);
  }
  return names;
}

export async function loadOfflineIndex(options: LoadOfflineIndexOptions): Promise<OfflineIndex> {
  const { strippedPath, namesPath, maxScan } = options;
  if (!(await fs.pathExists(strippedPath))) {
    throw new OfflineIndexError(strippedPath, `stripped file not found: ${strippedPath}`);
  }

  const entries: OfflineEntry[] = [];
  let scanned = 0;
  try {
    const lines = openLines(strippedPath);
    for await (const raw of lines) {
      scanned++;
      const entry = parseStrippedLine(raw);
      if (entry) entries.push(entry);
      if (maxScan !== undefined && scanned >= maxScan) {
        lines.close();
        break;
      }
    }
  } catch (e) {
    throw new OfflineIndexError(strippedPath, `couldn't read stripped file: ${e instanceof Error ? e.message : String(e)}`);
  }

  let names = new Map<string, string>();
  if (namesPath) {
    if (await fs.pathExists(namesPath)) {
      try {
        names = await loadNames(namesPath);
      } catch (e) {
        log.warn('names_unreadable', { path: namesPath, err: e instanceof Error ? e.message : String(e) });
      }
    } else {
      log.warn('names_missing', { path: namesPath });
    }
  }

  log.info('offline_index_loaded', { path: strippedPath, scanned, entries: entries.length, names: names.size });
  return { strippedPath, entries, names, scanned };
}
