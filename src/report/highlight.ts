/**
 * Per-node highlighting for node-list cells.
 *
 * Membership is compared as sets: a node is highlighted when the
 * counterpart cell does not contain it, wherever it appears. Two lists
 * holding the same nodes in a different order produce no highlights.
 */

export const PLACEHOLDER = "-";

export interface NodePart {
  readonly name: string;
  readonly highlighted: boolean;
}

/**
 * Split a comma-joined node list. Blank entries and the "-" placeholder
 * are dropped.
 */
export function splitNodeList(text: string): string[] {
  return text
    .split(",")
    .map((node) => node.trim())
    .filter((node) => node !== "" && node !== PLACEHOLDER);
}

export function highlightNodes(cell: readonly string[], counterpart: readonly string[]): NodePart[] {
  const other = new Set(counterpart);
  return cell.map((name) => ({ name, highlighted: !other.has(name) }));
}
