import { type AttributeMap, formatAttributes, quoteIdentifier } from './attributes.js';

/** Directed connection `source -> target`. */
export class GraphEdge {
  constructor(
    readonly source: string,
    readonly target: string,
    readonly attributes: AttributeMap,
  ) {}

  render(): string {
    const head = `${quoteIdentifier(this.source)} -> ${quoteIdentifier(this.target)}`;
    const attributes = formatAttributes(this.attributes);
    return attributes ? `${head} ${attributes}` : head;
  }
}
