/**
 * Tech Stack Detection
 *
 * Reads marker files at the project root only.
 */

import { existsSync } from 'fs';
import path from 'path';

const STACK_MARKERS: ReadonlyArray<{ readonly stack: string; readonly files: ReadonlyArray<string> }> = [
  { stack: 'Python', files: ['requirements.txt', 'setup.py', 'pyproject.toml'] },
  { stack: 'JavaScript/TypeScript', files: ['package.json'] },
  { stack: 'Go', files: ['go.mod'] },
];

export const UNKNOWN_STACK = 'Unknown';

export function detectTechStack(projectRoot: string): string[] {
  const stacks = STACK_MARKERS.filter(marker =>
    marker.files.some(file => existsSync(path.join(projectRoot, file)))
  ).map(marker => marker.stack);

  return stacks.length > 0 ? stacks : [UNKNOWN_STACK];
}
