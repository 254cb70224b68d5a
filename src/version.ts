import fs from 'node:fs';
import path from 'node:path';

export const APP_VERSION = Symbol('APP_VERSION');

/** Version of the package.json one level above this file (src/ or dist/). */
export function packageVersion(): string {
  const file = path.join(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (
    pkg &&
    typeof pkg === 'object' &&
    'version' in pkg &&
    typeof pkg.version === 'string'
  ) {
    return pkg.version;
  }
  return '0.0.0';
}
