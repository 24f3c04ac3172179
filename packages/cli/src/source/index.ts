import { execFile } from 'child_process';
import fs from 'fs/promises';
import { promisify } from 'util';
import { Err, Ok, type Result, SourceError, getErrorMessage } from '@depdot/core';

const execFileAsync = promisify(execFile);

/** Listings larger than this are treated as a failed command. */
const MAX_LISTING_BYTES = 64 * 1024 * 1024;

export type ListingSource =
  | { kind: 'command'; command: string; cwd: string; timeoutMs: number }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

/** Minimal readable used for stdin, so tests can pass any async iterable. */
export type TextStream = AsyncIterable<string | Buffer>;

/**
 * Split a command line on whitespace. No shell: quotes, globs and
 * pipes are passed through literally.
 */
export function tokenizeCommand(command: string): string[] {
  return command.trim().split(/\s+/).filter(token => token !== '');
}

interface ExecFailure {
  code?: unknown;
  signal?: unknown;
  killed?: unknown;
  stderr?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

function describeExecFailure(command: string, error: unknown): SourceError {
  const failure: ExecFailure = isExecFailure(error) ? error : {};
  const stderr = typeof failure.stderr === 'string' ? failure.stderr.trim() : '';
  const context = { command, exitCode: failure.code, signal: failure.signal, stderr };

  if (failure.code === 'ENOENT') {
    return new SourceError(`Source command not found: ${command}`, context);
  }
  if (failure.killed === true) {
    return new SourceError(`Source command timed out: ${command}`, context);
  }
  if (typeof failure.code === 'number') {
    const detail = stderr ? `\n${stderr}` : '';
    return new SourceError(
      `Source command failed (exit ${failure.code}): ${command}${detail}`,
      context,
    );
  }
  return new SourceError(`Source command failed: ${command}: ${getErrorMessage(error)}`, context);
}

async function runCommand(
  source: Extract<ListingSource, { kind: 'command' }>,
): Promise<Result<string, SourceError>> {
  const [file, ...args] = tokenizeCommand(source.command);
  if (!file) {
    return Err(new SourceError('Source command is empty'));
  }

  try {
    const { stdout } = await execFileAsync(file, args, {
      cwd: source.cwd,
      timeout: source.timeoutMs,
      maxBuffer: MAX_LISTING_BYTES,
      encoding: 'utf8',
    });
    return Ok(stdout);
  } catch (error) {
    return Err(describeExecFailure(source.command, error));
  }
}

async function readStream(stream: TextStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  }
  return chunks.join('');
}

/**
 * Read the complete dependency listing from `source`.
 * A command exiting non-zero is an error, whatever it printed.
 */
export async function readListing(
  source: ListingSource,
  stdin: TextStream = process.stdin,
): Promise<Result<string, SourceError>> {
  switch (source.kind) {
    case 'command':
      return runCommand(source);
    case 'file':
      try {
        return Ok(await fs.readFile(source.path, 'utf-8'));
      } catch (error) {
        return Err(
          new SourceError(`Cannot read ${source.path}: ${getErrorMessage(error)}`, {
            path: source.path,
          }),
        );
      }
    case 'stdin':
      try {
        return Ok(await readStream(stdin));
      } catch (error) {
        return Err(new SourceError(`Cannot read stdin: ${getErrorMessage(error)}`));
      }
  }
}

/** Human-readable description for progress messages. */
export function describeSource(source: ListingSource): string {
  switch (source.kind) {
    case 'command':
      return `\`${source.command}\``;
    case 'file':
      return source.path;
    case 'stdin':
      return 'stdin';
  }
}
