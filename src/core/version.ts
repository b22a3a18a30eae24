import fs from 'fs';
import path from 'path';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

let cached: string | null = null;

export function readPackageVersion(): string {
  if (cached) return cached;
  const pkgPath = findPackageJson(__dirname);
  let version = '0.0.0';
  if (pkgPath) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        version = parsed.version;
      }
    } catch {
      version = '0.0.0';
    }
  }
  cached = version;
  return version;
}
