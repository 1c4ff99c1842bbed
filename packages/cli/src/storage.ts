import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const CONFIG_DIR_NAME = '.pathguard';

/**
 * Path of the config directory. Reading never creates it.
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/**
 * Read and parse a JSON file from the config directory.
 * Returns null when the file does not exist; read and parse errors propagate.
 */
export function readJsonFile(filename: string): unknown {
  const filePath = path.join(getConfigDir(), filename);

  if (!fs.existsSync(filePath)) {
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}
