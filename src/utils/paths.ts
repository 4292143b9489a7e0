import * as path from 'path';

/** Per-project directory holding config, .env and the outbox */
export const PROJECT_DIR = '.dispatchkit';

export function getConfigPath(projectRoot: string = process.cwd()): string {
  return path.join(projectRoot, PROJECT_DIR, 'config.yaml');
}
