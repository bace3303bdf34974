import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';

import { SettingsService } from './config';
import { logger } from './logger';
import { createApp } from './server';
import { generateCards } from './services/batch/cardBatch';
import { CardRenderer } from './services/cards/cardRenderer';
import { loadSpellsFromFile } from './services/records/recordLoader';
import { ResourceResolver } from './services/resources/resourceResolver';
import { defaultStyleDocument, makeDefaultStyleConfig, readStyleConfigFile } from './services/style/styleConfig';

export const USAGE = [
  'usage: spell-card-maker (generate | make_config | serve) ...',
  '',
  '  generate INPUT_FILE [-o OUTPUT_DIR] [-s SINGLE_SPELL] [-c CONFIG]',
  '      generates spell cards for all data in the provided input file',
  '  make_config [-o]',
  '      creates a default config file that can be used to customize spell card generation',
  '  serve',
  '      starts the card preview API',
].join('\n');

export interface CliContext {
  cwd: string;
  signal?: AbortSignal;
}

async function generate(args: string[], context: CliContext): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      output_dir: { type: 'string', short: 'o' },
      single_spell: { type: 'string', short: 's' },
      config: { type: 'string', short: 'c' },
    },
  });
  const [inputFile] = positionals;
  if (!inputFile) {
    logger.error('[CLI] generate requires an INPUT_FILE');
    return 2;
  }

  const config = values.config ? readStyleConfigFile(path.resolve(context.cwd, values.config)) : makeDefaultStyleConfig();
  const records = loadSpellsFromFile(path.resolve(context.cwd, inputFile));
  if (records.length === 0) {
    logger.warn('[CLI] No spells could be loaded from the provided input file. Is the file formatted correctly?');
    return 1;
  }

  const settings = SettingsService.getInstance().load();
  const renderer = new CardRenderer({
    config,
    resolver: ResourceResolver.fromRoots(settings.resources),
  });
  const outputDirectory = path.resolve(context.cwd, values.output_dir ?? config.general.outputDirectory);
  const result = await generateCards(records, renderer, {
    outputDirectory,
    only: values.single_spell,
    signal: context.signal,
  });

  logger.info(
    `[CLI] ${result.rendered.length} card(s) generated, ${result.failed.length} failed` +
      (result.cancelled ? ' (cancelled)' : '')
  );
  return result.failed.length > 0 || result.cancelled ? 1 : 0;
}

async function makeConfig(args: string[], context: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { overwrite: { type: 'boolean', short: 'o', default: false } },
  });
  const { configFilename } = SettingsService.getInstance().load();
  const outFile = path.join(context.cwd, configFilename);
  if (existsSync(outFile) && !values.overwrite) {
    logger.error(`[CLI] The file "${configFilename}" already exists. You must specify the -o option to overwrite it.`);
    return 1;
  }
  await writeFile(outFile, `${JSON.stringify(defaultStyleDocument(), null, 4)}\n`, 'utf-8');
  logger.info(`[CLI] Wrote ${outFile}`);
  return 0;
}

async function serve(context: CliContext): Promise<number> {
  const settings = SettingsService.getInstance().load();
  const renderer = new CardRenderer({
    config: makeDefaultStyleConfig(),
    resolver: ResourceResolver.fromRoots(settings.resources),
  });
  const server = createApp(renderer).listen(settings.server.port, () => {
    logger.info(`Card preview API listening on http://localhost:${settings.server.port}`);
  });

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      logger.info('Shutting down preview API...');
      server.close(() => resolve());
    };
    if (context.signal?.aborted) {
      shutdown();
      return;
    }
    context.signal?.addEventListener('abort', shutdown, { once: true });
  });
  return 0;
}

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case 'generate':
      return generate(rest, context);
    case 'make_config':
      return makeConfig(rest, context);
    case 'serve':
      return serve(context);
    default:
      console.log(USAGE);
      return command === '-h' || command === '--help' ? 0 : 2;
  }
}
