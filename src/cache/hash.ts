import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';

import type { ToolInfo } from '../backend/backendTypes.js';

type HashInput = {
  sourcePath: string;
  moduleName: string;
  python: ToolInfo;
  optimize: boolean;
  platform: string;
};

export function computeHash(input: HashInput): string {
  const source = readFileSync(input.sourcePath);

  const hash = createHash('sha256');
  hash.update(source);
  hash.update(input.moduleName);
  hash.update(input.python.path);
  hash.update(input.python.version);
  hash.update(input.optimize ? 'O' : '-');
  hash.update(input.platform);

  return hash.digest('hex');
}
