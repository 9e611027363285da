import fs from 'node:fs/promises';
import { writeDefaultConfig } from '../core/config.js';
import { configPath, controlDir, logsDir, ticketsDir } from '../lib/paths.js';
import { info, output, success } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

export async function initCommand(options: GlobalOptions): Promise<void> {
  const root = controlDir();
  for (const dir of [root, ticketsDir(root), logsDir(root)]) {
    await fs.mkdir(dir, { recursive: true });
  }

  const wroteConfig = await writeDefaultConfig(root);

  if (options.json) {
    output({ root, config: configPath(root), wroteConfig }, true);
    return;
  }
  info(wroteConfig ? 'Wrote default config.yaml' : 'config.yaml already exists, skipping');
  success(`tixmux initialized in ${root}`);
}
