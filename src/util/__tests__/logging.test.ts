import { afterEach, describe, expect, it, jest } from "@jest/globals";
import { getLogLevel, logApplicationEvent, setLogLevel } from "../logging.js";

describe("logApplicationEvent", () => {
  afterEach(() => {
    setLogLevel("info");
    jest.restoreAllMocks();
  });

  it("should write the component and event with the details", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});

    logApplicationEvent("differ", "diffed", { changes: 3 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toBe("[differ] diffed");
    expect(log.mock.calls[0][1]).toMatchObject({
      component: "differ",
      event: "diffed",
      changes: 3,
    });
  });

  it("should write nothing when the level is silent", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("silent");

    logApplicationEvent("loader", "loaded");

    expect(getLogLevel()).toBe("silent");
    expect(log).not.toHaveBeenCalled();
  });
});
