import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import {
  type AttributeValue,
  type BuildOptions,
  type Graph,
  type MalformedLinePolicy,
  type Result,
  SourceError,
  StringSink,
  buildDependencyGraph,
  createStderrLogger,
  isOk,
  parseDependencyListing,
  unwrap,
} from '@depdot/core';
import { loadConfig } from '../config/loader.js';
import { RANKDIRS, type DepdotConfig } from '../config/schema.js';
import { type ListingSource, describeSource, readListing } from '../source/index.js';
import { TaskSpinner, formatDuration, handleCommandError, pluralize } from './utils.js';

export interface RenderOptions {
  command?: string;
  input?: string;
  output?: string;
  config?: string;
  label?: string;
  rankdir?: string;
  clusterSeparator?: string;
  highlight?: string[];
  skipMalformed?: boolean;
  verbose?: boolean;
}

export interface RenderSettings extends BuildOptions {
  onMalformed: MalformedLinePolicy;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateOptions(options: RenderOptions): void {
  if (options.command && options.input) {
    console.error(chalk.red('Error: --command and --input cannot be used together'));
    process.exit(1);
  }

  if (options.rankdir && !RANKDIRS.some(dir => dir === options.rankdir)) {
    console.error(
      chalk.red(
        `Error: Invalid --rankdir value "${options.rankdir}". Must be one of: ${RANKDIRS.join(', ')}`,
      ),
    );
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Option resolution (flags override config)
// ---------------------------------------------------------------------------

export function resolveSource(
  options: RenderOptions,
  config: DepdotConfig,
  rootDir: string,
): ListingSource {
  if (options.input) {
    return options.input === '-'
      ? { kind: 'stdin' }
      : { kind: 'file', path: path.resolve(rootDir, options.input) };
  }

  const command = options.command ?? config.source.command;
  if (command) {
    return { kind: 'command', command, cwd: rootDir, timeoutMs: config.source.timeoutMs };
  }
  return { kind: 'stdin' };
}

export function resolveRenderSettings(options: RenderOptions, config: DepdotConfig): RenderSettings {
  const graphAttributes: Record<string, AttributeValue> = { ...config.graph.attributes };
  const rankdir = options.rankdir ?? config.graph.rankdir;
  if (rankdir) {
    graphAttributes.rankdir = rankdir;
  }

  return {
    label: options.label ?? config.graph.label,
    graphAttributes,
    nodeDefaults: config.graph.nodeDefaults,
    edgeDefaults: config.graph.edgeDefaults,
    clusterSeparator: options.clusterSeparator ?? config.graph.clusterSeparator,
    highlight: options.highlight ?? config.graph.highlight,
    onMalformed: options.skipMalformed ? 'skip' : config.input.onMalformed,
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/** Nodes in the graph and all of its clusters. */
export function countNodes(graph: Graph): number {
  let count = graph.nodes.size;
  const pending = [...graph.clusters];
  for (let cluster = pending.pop(); cluster; cluster = pending.pop()) {
    count += cluster.nodes.size;
    pending.push(...cluster.clusters);
  }
  return count;
}

async function loadListing(source: ListingSource): Promise<Result<string, SourceError>> {
  if (source.kind !== 'command') {
    return readListing(source);
  }

  const spinner = new TaskSpinner(`Running ${describeSource(source)}...`);
  const listing = await readListing(source);
  if (isOk(listing)) {
    spinner.succeed(`Read dependency listing from ${describeSource(source)}`);
  } else {
    spinner.fail(`Dependency listing command failed`);
  }
  return listing;
}

/**
 * Render a dependency listing as a DOT document.
 *
 * The document is rendered in memory first, so a failure never leaves a
 * truncated file behind.
 */
export async function renderCommand(options: RenderOptions): Promise<void> {
  const rootDir = process.cwd();
  const verbose = options.verbose ?? false;
  const logger = createStderrLogger({ verbose });

  validateOptions(options);

  try {
    const config = loadConfig(rootDir, options.config);
    const source = resolveSource(options, config, rootDir);
    const settings = resolveRenderSettings(options, config);

    if (source.kind === 'stdin' && process.stdin.isTTY) {
      throw new SourceError(
        'No dependency listing on stdin. Pipe one in, or pass --command or --input',
      );
    }

    const listing = unwrap(await loadListing(source));

    const startTime = Date.now();
    const entries = parseDependencyListing(listing, {
      onMalformed: settings.onMalformed,
      logger,
    });
    const graph = buildDependencyGraph(entries, { ...settings, logger });
    const sink = new StringSink();
    graph.serialize(sink);
    const summary =
      `${pluralize(countNodes(graph), 'node')}, ${pluralize(graph.edges.size, 'edge')} ` +
      `in ${formatDuration(Date.now() - startTime)}`;

    if (options.output) {
      const outputPath = path.resolve(rootDir, options.output);
      await fs.writeFile(outputPath, sink.toString(), 'utf-8');
      console.error(chalk.green(`✓ Wrote ${outputPath} (${summary})`));
    } else {
      process.stdout.write(sink.toString());
      logger.debug(`Rendered ${summary}`);
    }
  } catch (error) {
    handleCommandError(error, verbose);
    process.exit(1);
  }
}
