import { homedir } from 'node:os';
import { join } from 'node:path';

function homeDir(): string {
  // Respect HOME when set (important for tests/sandboxes/containers).
  return process.env.HOME ?? homedir();
}

export function getCacheRoot(override?: string): string {
  return override ?? join(homeDir(), '.pyship', 'cache');
}

export function getCacheEntry(hash: string, root: string = getCacheRoot()): string {
  return join(root, hash);
}
