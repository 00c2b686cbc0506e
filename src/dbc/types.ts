/**
 * In-memory shape of a CAN database, reduced to what the comparison needs:
 * per message its name, frame id, sender and receiver nodes, and signal names.
 */

export interface MessageRecord {
  readonly name: string;
  /** Arbitration id with the extended-frame flag bit cleared */
  readonly frameId: number;
  readonly senders: readonly string[];
  readonly receivers: readonly string[];
  readonly signals: readonly string[];
}

export interface CanDatabase {
  /** Display name of the file the database was loaded from (its basename) */
  readonly source: string;
  /** Keyed by {@link messageKey}, in file order */
  readonly messages: ReadonlyMap<string, MessageRecord>;
}

export interface MessageInit {
  name: string;
  frameId: number;
  senders?: Iterable<string>;
  receivers?: Iterable<string>;
  signals?: Iterable<string>;
}

const EXTENDED_FRAME_FLAG = 0x80000000;

/** Clear the extended-frame flag (bit 31) that DBC files set on 29-bit ids */
export function stripExtendedFlag(rawId: number): number {
  return rawId >= EXTENDED_FRAME_FLAG ? rawId - EXTENDED_FRAME_FLAG : rawId;
}

/** Lowercase `0x` hex with no padding, e.g. 256 -> "0x100" */
export function formatFrameId(frameId: number): string {
  return `0x${frameId.toString(16)}`;
}

/**
 * A message is identified by name and frame id together; changing either
 * makes it a different message.
 */
export function messageKey(name: string, frameId: number): string {
  return `${name}|${formatFrameId(frameId)}`;
}

export function createMessageRecord(init: MessageInit): MessageRecord {
  return Object.freeze({
    name: init.name,
    frameId: init.frameId,
    senders: uniqueInOrder(init.senders),
    receivers: uniqueInOrder(init.receivers),
    signals: uniqueInOrder(init.signals),
  });
}

/**
 * Build a database from message records. Keys must be unique; the loaders
 * reject duplicates before calling this, so a duplicate here is a bug.
 */
export function createDatabase(source: string, records: Iterable<MessageRecord>): CanDatabase {
  const messages = new Map<string, MessageRecord>();
  for (const record of records) {
    const key = messageKey(record.name, record.frameId);
    if (messages.has(key)) {
      throw new Error(`Duplicate message ${key} in ${source}`);
    }
    messages.set(key, record);
  }
  return Object.freeze({ source, messages });
}

function uniqueInOrder(values: Iterable<string> | undefined): readonly string[] {
  return Object.freeze([...new Set(values ?? [])]);
}
