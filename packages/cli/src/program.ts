/**
 * Command-line definition for `archconf <database>`.
 */

import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { runConvert } from './commands/convert.js';
import { EXIT_FAILURE } from './utils/errorFormatter.js';

// src/ and dist/ both sit next to package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

export interface MainOptions {
  /** Working directory for config lookup and relative input paths */
  cwd?: string;
  /** Where commander writes help, version and usage errors */
  output?: OutputConfiguration;
}

/**
 * Parse `args` (without the node and script entries), run the conversion and
 * return the exit status: 0 on success, --help and --version, 2 otherwise.
 */
export async function main(args: string[], options: MainOptions = {}): Promise<number> {
  let status = 0;

  const program = new Command()
    .name('archconf')
    .description('Convert a database file into an archive engine configuration (<name>_arch.xml)')
    .version(pkg.version)
    .argument('[database]', 'Database file to convert, e.g. motors.db')
    .allowExcessArguments(false)
    .exitOverride()
    .addHelpText('after', `
Examples:
  archconf motors.db             Write motors_arch.xml next to motors.db
`)
    .action(async (database: string | undefined) => {
      status = await runConvert(database, { cwd: options.cwd });
    });

  if (options.output) {
    program.configureOutput(options.output);
  }

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_FAILURE;
    }
    throw err;
  }

  return status;
}
