import {
  type AttributeMap,
  formatAttributes,
  mergeAttributes,
  quoteIdentifier,
} from './attributes.js';

/**
 * A labeled vertex. The label is written as the `label` attribute and
 * replaces any `label` key in `attributes`.
 */
export class GraphNode {
  constructor(
    readonly id: string,
    readonly label: string,
    readonly attributes: AttributeMap,
  ) {}

  get quotedId(): string {
    return quoteIdentifier(this.id);
  }

  /** Width of the quoted id in code points. */
  get idWidth(): number {
    return [...this.quotedId].length;
  }

  /**
   * `"id" [attrs]`, with the quoted id padded to `idWidth` code points
   * so that sibling nodes line up in one column.
   */
  render(idWidth = 0): string {
    const attributes = mergeAttributes(this.attributes, new Map([['label', this.label]]));
    const padding = ' '.repeat(Math.max(0, idWidth - this.idWidth));
    return `${this.quotedId}${padding} ${formatAttributes(attributes)}`;
  }
}
