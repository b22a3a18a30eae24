import os from 'os';
import path from 'path';

export function defaultCacheDir(): string {
  const xdg = String(process.env.XDG_CACHE_HOME ?? '').trim();
  const base = xdg ? xdg : path.join(os.homedir(), '.cache');
  return path.join(base, 'seqprobe');
}

export function defaultCacheDbPath(): string {
  return path.join(defaultCacheDir(), 'cache.sqlite');
}

export function isGzipPath(p: string): boolean {
  return path.extname(p).toLowerCase() === '.gz';
}
