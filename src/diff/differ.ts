/**
 * Database comparison.
 *
 * Messages are matched on their (name, frame id) key. A renamed or
 * re-identified message therefore shows up as one removal plus one
 * addition. Signals are matched by name only.
 */

import type { NodeOrder } from "../config.js";
import type { CanDatabase, MessageRecord } from "../dbc/types.js";
import {
  ChangeKind,
  type ChangeRecord,
  type ChangeSummary,
  type MessageRef,
  type NodeAssignment,
} from "./types.js";

export interface DiffOptions {
  /** Defaults to "ordered": a reordered node list counts as changed */
  nodeOrder?: NodeOrder;
}

/**
 * Compare two databases.
 *
 * Records for messages of `oldDb` come first, in `oldDb` iteration order
 * (per message: node change, removed signals, added signals), followed by
 * one MessageAdded per message that only `newDb` has, in `newDb` order.
 */
export function diffDatabases(
  oldDb: CanDatabase,
  newDb: CanDatabase,
  options: DiffOptions = {}
): ChangeRecord[] {
  const nodeOrder = options.nodeOrder ?? "ordered";
  const changes: ChangeRecord[] = [];

  for (const [key, oldMsg] of oldDb.messages) {
    const newMsg = newDb.messages.get(key);
    if (!newMsg) {
      changes.push(freeze({
        kind: ChangeKind.MessageRemoved,
        key,
        old: { ...messageRef(oldMsg), ...nodeAssignment(oldMsg) },
      }));
      continue;
    }

    const message = messageRef(oldMsg);
    const oldNodes = nodeAssignment(oldMsg);
    const newNodes = nodeAssignment(newMsg);

    if (
      !sameNodes(oldMsg.senders, newMsg.senders, nodeOrder) ||
      !sameNodes(oldMsg.receivers, newMsg.receivers, nodeOrder)
    ) {
      changes.push(freeze({
        kind: ChangeKind.NodesChanged,
        key,
        message,
        old: oldNodes,
        new: newNodes,
      }));
    }

    const newSignals = new Set(newMsg.signals);
    for (const signal of oldMsg.signals) {
      if (!newSignals.has(signal)) {
        changes.push(freeze({ kind: ChangeKind.SignalRemoved, key, message, signal, old: oldNodes }));
      }
    }

    const oldSignals = new Set(oldMsg.signals);
    for (const signal of newMsg.signals) {
      if (!oldSignals.has(signal)) {
        changes.push(freeze({ kind: ChangeKind.SignalAdded, key, message, signal, new: newNodes }));
      }
    }
  }

  for (const [key, newMsg] of newDb.messages) {
    if (!oldDb.messages.has(key)) {
      changes.push(freeze({
        kind: ChangeKind.MessageAdded,
        key,
        new: { ...messageRef(newMsg), ...nodeAssignment(newMsg) },
      }));
    }
  }

  return changes;
}

/**
 * Count records per kind. Every kind is present, with 0 when absent.
 */
export function summarizeChanges(changes: readonly ChangeRecord[]): ChangeSummary {
  const summary: ChangeSummary = {
    MessageRemoved: 0,
    MessageAdded: 0,
    SignalRemoved: 0,
    SignalAdded: 0,
    NodesChanged: 0,
  };
  for (const change of changes) {
    summary[change.kind]++;
  }
  return summary;
}

export function joinNodes(nodes: readonly string[]): string {
  return nodes.join(",");
}

function sameNodes(a: readonly string[], b: readonly string[], nodeOrder: NodeOrder): boolean {
  if (nodeOrder === "ordered") {
    return joinNodes(a) === joinNodes(b);
  }
  const setA = new Set(a);
  const setB = new Set(b);
  return setA.size === setB.size && [...setA].every((node) => setB.has(node));
}

function messageRef(message: MessageRecord): MessageRef {
  return Object.freeze({ name: message.name, frameId: message.frameId });
}

function nodeAssignment(message: MessageRecord): NodeAssignment {
  return Object.freeze({ tx: joinNodes(message.senders), rx: joinNodes(message.receivers) });
}

function freeze<T extends ChangeRecord>(change: T): T {
  Object.freeze(change);
  return change;
}
