import { defineCommand } from 'citty';
import { consola } from 'consola';
import { writeFile, mkdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { CONFIG_FILE_NAME, CONFIG_TEMPLATE } from '../config.js';

export const initCommand = defineCommand({
  meta: {
    name: 'init',
    description: `Write a ${CONFIG_FILE_NAME} for one agent`,
  },
  args: {
    dir: {
      type: 'positional',
      description: 'Directory to write the config into',
      default: '.',
    },
    name: {
      type: 'string',
      description: 'Agent name',
    },
    port: {
      type: 'string',
      description: 'Listener port',
    },
  },
  async run({ args }) {
    const dir = args.dir;
    const configPath = join(dir, CONFIG_FILE_NAME);

    if (await exists(configPath)) {
      consola.warn(`Config file already exists: ${configPath}`);
      return;
    }

    const config = {
      ...CONFIG_TEMPLATE,
      ...(args.name ? { agentName: args.name } : {}),
      ...(args.port ? { port: Number(args.port) } : {}),
    };

    await mkdir(dir, { recursive: true });
    await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
    consola.success(`Created ${configPath}`);

    consola.info('');
    consola.info('Next steps:');
    consola.info(`  1. Give each agent its own port in ${CONFIG_FILE_NAME}`);
    consola.info('  2. Run: murmur join');
  },
});

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
