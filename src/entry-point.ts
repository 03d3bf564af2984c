import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * True when the module at `moduleUrl` is the script Node was started with,
 * including through a symlinked bin such as node_modules/.bin/retrieval.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) return false;
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
