import { readFileSync } from 'fs';
import { join } from 'path';

// Same relative location from src/ and dist/
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

function readVersion(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'version' in value && typeof value.version === 'string') {
    return value.version;
  }
  return '0.0.0';
}

export const CLI_VERSION = readVersion(pkg);

export const USER_AGENT = `cirrus-cli/${CLI_VERSION}`;
