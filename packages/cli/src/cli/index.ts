import { Command } from 'commander';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { renderCommand } from './render.js';

// Get version from package.json dynamically
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

function readVersion(): string {
  // ../ from the bundle in dist/, ../../ from src/cli/
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const packageJson: unknown = require(join(__dirname, candidate));
      if (
        packageJson &&
        typeof packageJson === 'object' &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

export const program = new Command();

program
  .name('depdot')
  .description('Render a dependency listing as a Graphviz DOT digraph')
  .version(readVersion())
  .option('-c, --command <command>', 'Command that prints the `name:deps` listing')
  .option('-i, --input <path>', 'Read the listing from a file ("-" for stdin)')
  .option('-o, --output <path>', 'Write the DOT document to a file (defaults to stdout)')
  .option('-l, --label <text>', 'Graph label')
  .option('--rankdir <dir>', 'Layout direction: TB, LR, BT, RL')
  .option('--cluster-separator <sep>', 'Group names into clusters by this path separator')
  .option('--highlight <names...>', 'Names to draw highlighted')
  .option('--skip-malformed', 'Skip malformed listing lines instead of failing')
  .option('--config <path>', 'Config file (defaults to .depdot.yml)')
  .option('-v, --verbose', 'Show detailed logging')
  .action(renderCommand);
