export type { DependencyEntry, MalformedLinePolicy, ParseOptions } from './parse.js';
export { parseDependencyListing } from './parse.js';
export type { BuildOptions } from './builder.js';
export {
  collectUsedNames,
  buildDependencyGraph,
  renderDependencyGraph,
  DEFAULT_GRAPH_LABEL,
  DEFAULT_HIGHLIGHT_STYLE,
} from './builder.js';
