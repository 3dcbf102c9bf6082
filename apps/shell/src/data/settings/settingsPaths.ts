import { homedir } from 'node:os';
import { join } from 'node:path';

export function resolveDataDirectory(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.CONTENTS_GENERATOR_DATA_DIR) {
    return env.CONTENTS_GENERATOR_DATA_DIR;
  }

  if (platform === 'win32') {
    const base = env.APPDATA ?? join(homedir(), 'AppData', 'Roaming');
    return join(base, 'ContentsGenerator');
  }

  const base = env.XDG_DATA_HOME ?? join(homedir(), '.local', 'share');
  return join(base, 'contents-generator');
}
