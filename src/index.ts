#!/usr/bin/env node
import * as path from 'path';
import figlet from 'figlet';
import { Command, Option } from '@commander-js/extra-typings';
import { Logger } from './logger.js';
import { PackagerError, inspectArchive, packArchive, unpackArchive } from './packager.js';
import { ARCHIVE_TYPES, CLIENT_VERSIONS, DEFAULT_PREFIXES } from './shader-constants.js';
import type { ArchiveType } from './shader-constants.js';

function fail(err: unknown): never {
  if (err instanceof PackagerError) {
    console.error(`operation failed: ${err.message}`);
    if (err.cause instanceof Error) {
      Logger.log(err.cause.message);
    }
  } else if (err instanceof Error) {
    console.error(`operation failed: ${err.message}`);
  } else {
    console.error('operation failed:', err);
  }
  process.exit(1);
}

function resolvePrefix(prefix: string | undefined, type: ArchiveType): string {
  return prefix ?? DEFAULT_PREFIXES[type];
}

const clientOption = () => new Option('-c, --client <client>', 'client the archive is for: pc (retail) or ce (Custom Edition)')
  .choices(CLIENT_VERSIONS)
  .makeOptionMandatory();

const typeOption = () => new Option('-t, --type <type>', 'archive type: fx (effects) or vsh (vertex shaders)')
  .choices(ARCHIVE_TYPES)
  .makeOptionMandatory();

const namesOption = () => new Option('-n, --names <file>', 'member names, one per line, in archive order');

const program = new Command()
  .name('shpak')
  .description('Pack and unpack encrypted shader archives')
  .option('-d, --debug', 'print diagnostic output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().debug) {
      Logger.enableDebug();
    }
  });

console.log(figlet.textSync('shpak'));
console.log('shpak - shader archive packager\n');

program
  .command('unpack')
  .description('unpack the shader archive by writing each member to a file prefixed with PREFIX (default "fx/" or "vsh/")')
  .argument('<archive>', 'archive to read')
  .argument('[prefix]', 'prefix for member files')
  .addOption(clientOption())
  .addOption(typeOption())
  .addOption(namesOption())
  .action((archive, prefix, options) => {
    const resolvedPrefix = resolvePrefix(prefix, options.type);
    console.log('Archive: ' + path.resolve(process.cwd(), archive));
    try {
      const summary = unpackArchive({
        client: options.client,
        type: options.type,
        file: archive,
        prefix: resolvedPrefix,
        namesFile: options.names,
      });
      console.log(`unpacked ${summary.written} archive members prefixed with ${resolvedPrefix}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('pack')
  .description('create the shader archive from member files prefixed with PREFIX (default "fx/" or "vsh/")')
  .argument('<archive>', 'archive to write')
  .argument('[prefix]', 'prefix for member files')
  .addOption(clientOption())
  .addOption(typeOption())
  .addOption(namesOption())
  .action((archive, prefix, options) => {
    const resolvedPrefix = resolvePrefix(prefix, options.type);
    try {
      const summary = packArchive({
        client: options.client,
        type: options.type,
        file: archive,
        prefix: resolvedPrefix,
        namesFile: options.names,
      });
      console.log(`packed ${summary.members} members (${summary.bytes} bytes) into ${path.resolve(process.cwd(), archive)}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('info')
  .description('validate the shader archive and list its members')
  .argument('<archive>', 'archive to read')
  .action((archive) => {
    try {
      const sizes = inspectArchive(archive);
      sizes.forEach((size, index) => console.log(`${String(index).padStart(3, '0')}: ${size} bytes`));
      console.log(`${sizes.length} members, archive is valid`);
    } catch (err) {
      fail(err);
    }
  });

program.parse(process.argv);
