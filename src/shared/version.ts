import * as fs from 'fs';
import { fileURLToPath } from 'url';

const UNKNOWN = 'unknown';
let cachedVersion: string | null = null;

function readPackageVersionFromDisk(): string | null {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson !== 'object' || packageJson === null || !('version' in packageJson)) {
      return null;
    }
    const { version } = packageJson;
    return typeof version === 'string' && version.trim().length > 0 ? version.trim() : null;
  } catch (err) {
    console.error('[copybook-mcp] Could not read package.json version:',
      err instanceof Error ? err.message : String(err));
    return null;
  }
}

export function getPackageVersion(): string {
  if (cachedVersion) return cachedVersion;
  const fromEnv = process.env.npm_package_version?.trim();
  if (fromEnv && fromEnv.length > 0) {
    cachedVersion = fromEnv;
    return cachedVersion;
  }
  cachedVersion = readPackageVersionFromDisk() ?? UNKNOWN;
  return cachedVersion;
}
