/**
 * Change records produced by comparing two CAN databases.
 *
 * Each variant carries only the fields that are meaningful for its kind;
 * the flat 13-column row is built by the reporter.
 */

export const ChangeKind = {
  MessageRemoved: "MessageRemoved",
  MessageAdded: "MessageAdded",
  SignalRemoved: "SignalRemoved",
  SignalAdded: "SignalAdded",
  NodesChanged: "NodesChanged",
} as const;

export type ChangeKind = (typeof ChangeKind)[keyof typeof ChangeKind];

/** Labels written to the Comments column of the report */
export const CHANGE_KIND_LABELS: Record<ChangeKind, string> = {
  MessageRemoved: "Message Removed",
  MessageAdded: "Message Added",
  SignalRemoved: "Signal Removed",
  SignalAdded: "Signal Added",
  NodesChanged: "Tx/Rx Node Changed",
};

export interface MessageRef {
  readonly name: string;
  readonly frameId: number;
}

/** Sender (tx) and receiver (rx) lists joined with "," in their original order */
export interface NodeAssignment {
  readonly tx: string;
  readonly rx: string;
}

export interface MessageRemovedChange {
  readonly kind: typeof ChangeKind.MessageRemoved;
  readonly key: string;
  readonly old: MessageRef & NodeAssignment;
}

export interface MessageAddedChange {
  readonly kind: typeof ChangeKind.MessageAdded;
  readonly key: string;
  readonly new: MessageRef & NodeAssignment;
}

export interface SignalRemovedChange {
  readonly kind: typeof ChangeKind.SignalRemoved;
  readonly key: string;
  readonly message: MessageRef;
  readonly signal: string;
  readonly old: NodeAssignment;
}

export interface SignalAddedChange {
  readonly kind: typeof ChangeKind.SignalAdded;
  readonly key: string;
  readonly message: MessageRef;
  readonly signal: string;
  readonly new: NodeAssignment;
}

export interface NodesChangedChange {
  readonly kind: typeof ChangeKind.NodesChanged;
  readonly key: string;
  readonly message: MessageRef;
  readonly old: NodeAssignment;
  readonly new: NodeAssignment;
}

export type ChangeRecord =
  | MessageRemovedChange
  | MessageAddedChange
  | SignalRemovedChange
  | SignalAddedChange
  | NodesChangedChange;

export type ChangeSummary = Record<ChangeKind, number>;
