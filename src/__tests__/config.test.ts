import { describe, expect, it } from "@jest/globals";
import { resolveConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("resolveConfig", () => {
  it("should fall back to defaults", () => {
    expect(resolveConfig({}, {})).toEqual({
      nodeOrder: "ordered",
      sheetName: "DBC Comparison",
      columnWidth: 22,
      logLevel: "info",
    });
  });

  it("should read the environment and ignore empty values", () => {
    const config = resolveConfig({}, {
      DBC_DIFF_NODE_ORDER: "set",
      DBC_DIFF_COLUMN_WIDTH: "30",
      DBC_DIFF_SHEET_NAME: "",
    });

    expect(config.nodeOrder).toBe("set");
    expect(config.columnWidth).toBe(30);
    expect(config.sheetName).toBe("DBC Comparison");
  });

  it("should prefer overrides over the environment", () => {
    const config = resolveConfig(
      { nodeOrder: "ordered", logLevel: "silent" },
      { DBC_DIFF_NODE_ORDER: "set", DBC_DIFF_LOG_LEVEL: "info" }
    );

    expect(config.nodeOrder).toBe("ordered");
    expect(config.logLevel).toBe("silent");
  });

  it("should reject an unknown node order policy naming its variable", () => {
    expect(() => resolveConfig({}, { DBC_DIFF_NODE_ORDER: "sorted" })).toThrow(ConfigError);
    expect(() => resolveConfig({}, { DBC_DIFF_NODE_ORDER: "sorted" })).toThrow(
      /nodeOrder \(DBC_DIFF_NODE_ORDER\)/
    );
  });

  it("should reject a non-numeric column width", () => {
    expect(() => resolveConfig({ columnWidth: "wide" }, {})).toThrow(/columnWidth/);
  });

  it("should reject a sheet name longer than 31 characters", () => {
    expect(() => resolveConfig({ sheetName: "x".repeat(32) }, {})).toThrow(ConfigError);
  });

  it.each(["Rel/2", "Q1 [draft]", "a:b", "why?", "C:\\out", "all*"])(
    "should reject the reserved characters in sheet name %s",
    (sheetName) => {
      expect(() => resolveConfig({ sheetName }, {})).toThrow(
        "Invalid configuration - sheetName (DBC_DIFF_SHEET_NAME): Must not contain any of * ? : \\ / [ ]"
      );
    }
  );

  it("should reject a sheet name starting or ending with an apostrophe", () => {
    expect(() => resolveConfig({}, { DBC_DIFF_SHEET_NAME: "'Release" })).toThrow(
      "Invalid configuration - sheetName (DBC_DIFF_SHEET_NAME): Must not start or end with an apostrophe"
    );
    expect(() => resolveConfig({ sheetName: "Release'" }, {})).toThrow(ConfigError);
  });

  it("should accept other punctuation in a sheet name", () => {
    expect(resolveConfig({ sheetName: "Release 2.1 (final)" }, {}).sheetName).toBe("Release 2.1 (final)");
  });
});
