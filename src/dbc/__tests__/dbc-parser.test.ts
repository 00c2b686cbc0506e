import { describe, expect, it } from "@jest/globals";
import { LoadError } from "../../errors.js";
import { parseDbc } from "../dbc-parser.js";

const dbc = (...lines: string[]) => lines.join("\n");

describe("parseDbc", () => {
  it("should read messages with their sender, receivers and signals", () => {
    const text = dbc(
      'VERSION ""',
      "",
      "BU_: ECU1 ECU2 ECU3",
      "",
      "BO_ 256 Engine: 8 ECU1",
      ' SG_ RPM : 0|16@1+ (1,0) [0|8000] "rpm" ECU2,ECU3',
      ' SG_ Temp : 16|8@1- (0.5,-40) [-40|215] "degC" ECU3 ECU2',
      "",
      "BO_ 512 Brake: 4 ECU3",
      ' SG_ Pressure : 7|16@0+ (0.1,0) [0|250] "bar" ECU1'
    );

    expect(parseDbc(text, "test.dbc")).toEqual([
      { name: "Engine", frameId: 256, senders: ["ECU1"], receivers: ["ECU2", "ECU3"], signals: ["RPM", "Temp"] },
      { name: "Brake", frameId: 512, senders: ["ECU3"], receivers: ["ECU1"], signals: ["Pressure"] },
    ]);
  });

  it("should clear the extended-frame flag from the id", () => {
    const [message] = parseDbc("BO_ 2566844926 Ext: 8 ECU1", "test.dbc");

    expect(message.frameId).toBe(0x18fef1fe);
  });

  it("should drop the placeholder node from senders and receivers", () => {
    const text = dbc(
      "BO_ 100 Orphan: 1 Vector__XXX",
      ' SG_ Flag : 0|1@1+ (1,0) [0|1] "" Vector__XXX'
    );

    expect(parseDbc(text, "test.dbc")).toEqual([
      { name: "Orphan", frameId: 100, senders: [], receivers: [], signals: ["Flag"] },
    ]);
  });

  it("should read multiplexor and multiplexed signals", () => {
    const text = dbc(
      "BO_ 300 Diag: 8 ECU1",
      ' SG_ Mode M : 0|8@1+ (1,0) [0|3] "" ECU2',
      ' SG_ ValueA m0 : 8|8@1+ (1,0) [0|255] "" ECU2',
      ' SG_ ValueB m1 : 8|8@1+ (1,0) [0|255] "" ECU3'
    );

    const [message] = parseDbc(text, "test.dbc");

    expect(message.signals).toEqual(["Mode", "ValueA", "ValueB"]);
    expect(message.receivers).toEqual(["ECU2", "ECU3"]);
  });

  it("should append BO_TX_BU_ transmitters after the message sender", () => {
    const text = dbc(
      "BO_ 256 Engine: 8 ECU1",
      ' SG_ RPM : 0|16@1+ (1,0) [0|8000] "rpm" ECU2',
      "",
      "BO_TX_BU_ 256 : ECU1,Gateway;"
    );

    const [message] = parseDbc(text, "test.dbc");

    expect(message.senders).toEqual(["ECU1", "Gateway"]);
  });

  it("should skip statements hidden inside multi-line strings", () => {
    const text = dbc(
      "BO_ 256 Engine: 8 ECU1",
      'CM_ BO_ 256 "First line',
      "BO_ 999 Ghost: 8 ECU9",
      ' SG_ Phantom : 0|8@1+ (1,0) [0|255] "" ECU9";',
      'BA_ "GenMsgCycleTime" BO_ 256 10;'
    );

    expect(parseDbc(text, "test.dbc").map((m) => m.name)).toEqual(["Engine"]);
  });

  it("should treat backslashes inside strings as plain characters", () => {
    const text = dbc(
      'CM_ "Logs in C:\\logs\\";',
      "BO_ 256 Engine: 8 ECU1",
      ' SG_ RPM : 0|16@1+ (1,0) [0|8000] "\\" ECU2'
    );

    expect(parseDbc(text, "test.dbc")).toEqual([
      { name: "Engine", frameId: 256, senders: ["ECU1"], receivers: ["ECU2"], signals: ["RPM"] },
    ]);
  });

  it("should skip bare symbol names listed under NS_", () => {
    const text = dbc("NS_ :", "\tBO_TX_BU_", "\tSG_MUL_VAL_", "", "BS_:", "BO_ 1 One: 1 A");

    expect(parseDbc(text, "test.dbc").map((m) => m.name)).toEqual(["One"]);
  });

  it("should skip the independent-signals pseudo message", () => {
    const text = dbc(
      "BO_ 3221225472 VECTOR__INDEPENDENT_SIG_MSG: 0 Vector__XXX",
      ' SG_ Loose : 0|8@1+ (1,0) [0|255] "" Vector__XXX'
    );

    expect(parseDbc(text, "test.dbc")).toEqual([]);
  });

  describe("errors", () => {
    it("should reject a signal outside a message", () => {
      const text = dbc("BU_: A", ' SG_ X : 0|8@1+ (1,0) [0|255] "" A');

      expect(() => parseDbc(text, "bad.dbc")).toThrow("bad.dbc:2: Signal defined outside of a message");
    });

    it("should reject a malformed message definition", () => {
      expect(() => parseDbc("BO_ abc Engine: 8 ECU1", "bad.dbc")).toThrow(LoadError);
    });

    it("should reject a malformed signal definition with its line", () => {
      const text = dbc("BO_ 1 One: 1 A", " SG_ Broken : nonsense");

      let caught: unknown;
      try {
        parseDbc(text, "bad.dbc");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(LoadError);
      if (caught instanceof LoadError) {
        expect(caught.path).toBe("bad.dbc");
        expect(caught.line).toBe(2);
      }
    });

    it("should reject a string still open at the end of the text", () => {
      const text = dbc("BO_ 1 One: 1 A", 'CM_ BO_ 1 "never closed', "BO_ 2 Two: 1 A");

      expect(() => parseDbc(text, "bad.dbc")).toThrow("bad.dbc:2: Unterminated string");
    });

    it("should reject duplicate messages", () => {
      const text = dbc("BO_ 1 One: 1 A", "BO_ 1 One: 2 B");

      expect(() => parseDbc(text, "dup.dbc")).toThrow(
        "dup.dbc:2: Duplicate message One|0x1 (first defined on line 1)"
      );
    });

    it("should reject transmitters for an unknown message id", () => {
      expect(() => parseDbc("BO_TX_BU_ 42 : A,B;", "bad.dbc")).toThrow(
        "bad.dbc:1: BO_TX_BU_ refers to unknown message id 42"
      );
    });
  });
});
