import { MalformedInputLineError } from '../errors/index.js';
import { type Logger, silentLogger } from '../logger.js';

/** One `name:dep1 dep2` line of a dependency listing. */
export interface DependencyEntry {
  name: string;
  dependencies: string[];
  /** 1-based line number in the listing */
  line: number;
}

export type MalformedLinePolicy = 'fail' | 'skip';

export interface ParseOptions {
  /** `fail` (default) throws on the first bad line; `skip` logs and drops it. */
  onMalformed?: MalformedLinePolicy;
  logger?: Logger;
}

const SEPARATOR = ':';

function parseLine(text: string, lineNumber: number): DependencyEntry {
  const separatorAt = text.indexOf(SEPARATOR);
  if (separatorAt === -1) {
    throw new MalformedInputLineError(`missing "${SEPARATOR}" separator`, lineNumber, text);
  }

  const name = text.slice(0, separatorAt).trim();
  const rest = text.slice(separatorAt + 1);
  if (name === '') {
    throw new MalformedInputLineError('empty name', lineNumber, text);
  }
  if (rest.includes(SEPARATOR)) {
    throw new MalformedInputLineError(`unexpected extra "${SEPARATOR}"`, lineNumber, text);
  }

  const segment = rest.trim();
  const dependencies = segment === '' ? [] : segment.split(' ').filter(dep => dep !== '');
  return { name, dependencies, line: lineNumber };
}

/**
 * Parse a listing of `name:[dep1 dep2 ...]` lines. Blank lines are ignored.
 *
 * @throws {MalformedInputLineError} on a bad line, unless `onMalformed` is `skip`
 */
export function parseDependencyListing(text: string, options: ParseOptions = {}): DependencyEntry[] {
  const { onMalformed = 'fail', logger = silentLogger } = options;
  const entries: DependencyEntry[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === '') return;

    try {
      entries.push(parseLine(raw, index + 1));
    } catch (error) {
      if (onMalformed === 'skip' && error instanceof MalformedInputLineError) {
        logger.warning(`Skipping malformed line: ${error.message}`);
        return;
      }
      throw error;
    }
  });

  return entries;
}
