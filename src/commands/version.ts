import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

// Sources run from src/commands, the build from dist/src/commands.
function findPackageJson(startDir: string): string | undefined {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

export function getVersion(): string {
  try {
    const packageJsonPath = findPackageJson(dirname(fileURLToPath(import.meta.url)));
    if (!packageJsonPath) {
      return 'unknown';
    }
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return 'unknown';
  } catch (error) {
    console.error('Error reading version:', error);
    return 'unknown';
  }
}
