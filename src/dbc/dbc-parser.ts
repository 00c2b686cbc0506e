/**
 * Structural reader for the DBC text format.
 *
 * Only the statements that define the message/node/signal structure are
 * read: `BO_` (message and its transmitter), `SG_` (signal names and their
 * receivers) and `BO_TX_BU_` (additional transmitters). Everything else in
 * the file (comments, attributes, value tables, the `NS_` symbol list) is
 * skipped, including quoted strings that span several lines. Signal layout
 * and scaling are matched for well-formedness but not kept.
 */

import { LoadError } from "../errors.js";
import { createMessageRecord, messageKey, stripExtendedFlag, type MessageRecord } from "./types.js";

/** Placeholder node name DBC editors write when a message has no real sender or receiver */
export const NO_NODE = "Vector__XXX";

/** Pseudo message that holds signals not assigned to any frame */
const INDEPENDENT_SIGNALS_MESSAGE = "VECTOR__INDEPENDENT_SIG_MSG";

const MESSAGE_PATTERN = /^BO_\s+(\d+)\s+([A-Za-z_]\w*)\s*:\s*(\d+)\s+([A-Za-z_]\w*)\s*$/;

const SIGNAL_PATTERN =
  /^SG_\s+([A-Za-z_]\w*)(?:\s+(?:M|m\d+M?))?\s*:\s*\d+\|\d+@[01][+-]\s*\([^)]*\)\s*\[[^\]]*\]\s*"[^"]*"\s*(.*)$/;

const TRANSMITTERS_PATTERN = /^BO_TX_BU_\s+(\d+)\s*:\s*([^;]*);?\s*$/;

interface MessageDraft {
  name: string;
  frameId: number;
  line: number;
  senders: string[];
  receivers: string[];
  signals: string[];
}

interface TransmitterStatement {
  rawId: number;
  nodes: string[];
  line: number;
}

/**
 * Parse DBC text into message records, in the order the messages appear.
 * @param path - Used only in error messages
 * @throws LoadError on a malformed `BO_`/`SG_`/`BO_TX_BU_` statement, a
 * signal outside a message, a string left open at the end of the text,
 * or two messages with the same name and id
 */
export function parseDbc(text: string, path: string): MessageRecord[] {
  const drafts: MessageDraft[] = [];
  const transmitters: TransmitterStatement[] = [];
  let current: MessageDraft | null = null;
  // line of the quote that opened the string still being read, if any
  let openString: number | null = null;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = lines[index];

    if (openString !== null) {
      // continuation of a multi-line comment or attribute string
      if (countQuotes(line) % 2 === 1) openString = null;
      continue;
    }
    if (countQuotes(line) % 2 === 1) openString = lineNumber;

    const trimmed = line.trim();
    if (trimmed === "") continue;

    const tokens = trimmed.split(/\s+/);
    // bare symbol names, as listed under NS_
    if (tokens.length === 1) continue;

    switch (tokens[0]) {
      case "BO_": {
        current = parseMessage(trimmed, path, lineNumber);
        drafts.push(current);
        break;
      }
      case "SG_": {
        if (!current) {
          throw new LoadError(path, "Signal defined outside of a message", { line: lineNumber });
        }
        parseSignal(trimmed, current, path, lineNumber);
        break;
      }
      case "BO_TX_BU_": {
        current = null;
        transmitters.push(parseTransmitters(trimmed, path, lineNumber));
        break;
      }
      default:
        current = null;
    }
  }

  if (openString !== null) {
    throw new LoadError(path, "Unterminated string", { line: openString });
  }

  for (const statement of transmitters) {
    const frameId = stripExtendedFlag(statement.rawId);
    const targets = drafts.filter((draft) => draft.frameId === frameId);
    if (targets.length === 0) {
      throw new LoadError(path, `BO_TX_BU_ refers to unknown message id ${statement.rawId}`, {
        line: statement.line,
      });
    }
    for (const target of targets) {
      target.senders.push(...statement.nodes);
    }
  }

  const seen = new Map<string, number>();
  const records: MessageRecord[] = [];
  for (const draft of drafts) {
    if (draft.name === INDEPENDENT_SIGNALS_MESSAGE) continue;

    const key = messageKey(draft.name, draft.frameId);
    const firstLine = seen.get(key);
    if (firstLine !== undefined) {
      throw new LoadError(path, `Duplicate message ${key} (first defined on line ${firstLine})`, {
        line: draft.line,
      });
    }
    seen.set(key, draft.line);
    records.push(createMessageRecord(draft));
  }
  return records;
}

function parseMessage(statement: string, path: string, line: number): MessageDraft {
  const match = MESSAGE_PATTERN.exec(statement);
  if (!match) {
    throw new LoadError(path, `Malformed message definition: ${statement}`, { line });
  }
  const [, rawId, name, , sender] = match;
  return {
    name,
    frameId: stripExtendedFlag(Number(rawId)),
    line,
    senders: sender === NO_NODE ? [] : [sender],
    receivers: [],
    signals: [],
  };
}

function parseSignal(statement: string, message: MessageDraft, path: string, line: number): void {
  const match = SIGNAL_PATTERN.exec(statement);
  if (!match) {
    throw new LoadError(path, `Malformed signal definition: ${statement}`, { line });
  }
  const [, name, receiverList] = match;
  message.signals.push(name);
  message.receivers.push(...splitNodes(receiverList));
}

function parseTransmitters(statement: string, path: string, line: number): TransmitterStatement {
  const match = TRANSMITTERS_PATTERN.exec(statement);
  if (!match) {
    throw new LoadError(path, `Malformed transmitter list: ${statement}`, { line });
  }
  return { rawId: Number(match[1]), nodes: splitNodes(match[2]), line };
}

function splitNodes(list: string): string[] {
  return list
    .split(/[\s,]+/)
    .filter((node) => node !== "" && node !== NO_NODE);
}

// DBC strings have no escape sequences
function countQuotes(line: string): number {
  let count = 0;
  for (const char of line) {
    if (char === '"') count++;
  }
  return count;
}
