/**
 * Report layout: turns change records into the 13-column rows of the
 * comparison sheet, with a highlight flag on every cell (or on every node
 * of a node-list cell). No spreadsheet code lives here.
 */

import { formatFrameId } from "../dbc/types.js";
import { CHANGE_KIND_LABELS, type ChangeKind, type ChangeRecord, type MessageRef, type NodeAssignment } from "../diff/types.js";
import { PLACEHOLDER, highlightNodes, splitNodeList, type NodePart } from "./highlight.js";

export const REPORT_COLUMNS = [
  "Old Msg Name",
  "Old Msg ID",
  "Old Signal",
  "Old Details",
  "Old Tx Node",
  "Old Rx Node",
  "New Msg Name",
  "New Msg ID",
  "New Signal",
  "New Details",
  "New Tx Node",
  "New Rx Node",
  "Comments",
] as const;

/** Columns per side (name, id, signal, details, tx, rx) */
export const SIDE_WIDTH = 6;

export type ReportCell =
  | { readonly type: "text"; readonly value: string; readonly highlighted: boolean }
  | { readonly type: "nodes"; readonly parts: readonly NodePart[] };

export interface ReportRow {
  readonly kind: ChangeKind;
  readonly cells: readonly ReportCell[];
}

export function buildReportRows(changes: readonly ChangeRecord[]): ReportRow[] {
  return changes.map(buildReportRow);
}

export function buildReportRow(change: ChangeRecord): ReportRow {
  const [oldSide, newSide] = buildSides(change);
  return {
    kind: change.kind,
    cells: [...oldSide, ...newSide, text(CHANGE_KIND_LABELS[change.kind])],
  };
}

function buildSides(change: ChangeRecord): [ReportCell[], ReportCell[]] {
  switch (change.kind) {
    case "MessageRemoved":
      return [messageSide(change.old, null, change.old), emptySide(true)];
    case "MessageAdded":
      return [emptySide(true), messageSide(change.new, null, change.new)];
    case "SignalRemoved":
      return [
        messageSide(change.message, text(change.signal, true), change.old),
        messageSide(change.message, text(change.signal), null),
      ];
    case "SignalAdded":
      return [
        messageSide(change.message, text(change.signal), null),
        messageSide(change.message, text(change.signal, true), change.new),
      ];
    case "NodesChanged": {
      const oldTx = splitNodeList(change.old.tx);
      const oldRx = splitNodeList(change.old.rx);
      const newTx = splitNodeList(change.new.tx);
      const newRx = splitNodeList(change.new.rx);
      const identity = messageSide(change.message, null, null).slice(0, 4);
      return [
        [...identity, nodes(highlightNodes(oldTx, newTx)), nodes(highlightNodes(oldRx, newRx))],
        [...identity, nodes(highlightNodes(newTx, oldTx)), nodes(highlightNodes(newRx, oldRx))],
      ];
    }
  }
}

/**
 * Plain text of a cell as it appears in the sheet
 */
export function cellText(cell: ReportCell): string {
  if (cell.type === "text") return cell.value;
  return cell.parts.length === 0 ? PLACEHOLDER : cell.parts.map((part) => part.name).join(", ");
}

function messageSide(message: MessageRef, signal: ReportCell | null, nodeLists: NodeAssignment | null): ReportCell[] {
  return [
    text(message.name),
    text(formatFrameId(message.frameId)),
    signal ?? text(PLACEHOLDER),
    // signal-level details are not compared
    text(PLACEHOLDER),
    text(nodeLists?.tx ?? PLACEHOLDER),
    text(nodeLists?.rx ?? PLACEHOLDER),
  ];
}

function emptySide(highlighted: boolean): ReportCell[] {
  return Array.from({ length: SIDE_WIDTH }, () => text(PLACEHOLDER, highlighted));
}

function text(value: string, highlighted = false): ReportCell {
  return { type: "text", value: value === "" ? PLACEHOLDER : value, highlighted };
}

function nodes(parts: NodePart[]): ReportCell {
  return { type: "nodes", parts };
}
