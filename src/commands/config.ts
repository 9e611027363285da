import YAML from 'yaml';
import { loadConfig } from '../core/config.js';
import { controlDir } from '../lib/paths.js';
import { output } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

/** Print the effective configuration: defaults merged with config.yaml. */
export async function configCommand(options: GlobalOptions): Promise<void> {
  const config = await loadConfig(controlDir());
  output(options.json ? config : YAML.stringify(config).trimEnd(), options.json ?? false);
}
