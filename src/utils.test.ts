import { DateTime } from "luxon";
import { courseKey, formatError, maxRunIndex, nowLabel, parseRunIndex, slugify } from "./utils.js";

describe("nowLabel", () => {
  it("formats in UTC with milliseconds", () => {
    const at = DateTime.fromISO("2023-02-10T23:59:01.250-05:00");
    expect(nowLabel(at)).toBe("2023-02-11 04:59:01.250");
  });
});

describe("formatError", () => {
  it("prefixes the timestamp and logs the message", () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const at = DateTime.fromISO("2023-02-12T12:00:00Z");

    expect(formatError("Slack API error: ratelimited", at)).toBe(
      "[2023-02-12 12:00:00.000] Slack API error: ratelimited",
    );
    expect(spy).toHaveBeenCalledWith("[ERROR] Slack API error: ratelimited");
    spy.mockRestore();
  });
});

describe("slugify", () => {
  it("makes course keys safe for file names", () => {
    expect(slugify(courseKey("COS126", "S2023"))).toBe("cos126-s2023");
    expect(slugify("  Data/Structures: Fall '24 ")).toBe("data-structures-fall-24");
    expect(slugify("///")).toBe("course");
  });
});

describe("run indices", () => {
  it("parses positive integer keys only", () => {
    expect(parseRunIndex("12")).toBe(12);
    expect(parseRunIndex("0")).toBeNull();
    expect(parseRunIndex("-1")).toBeNull();
    expect(parseRunIndex("2023-02-12 12:00:00.000")).toBeNull();
  });

  it("finds the numeric maximum", () => {
    expect(maxRunIndex(["2", "10", "9"])).toBe(10);
    expect(maxRunIndex([])).toBeNull();
    expect(maxRunIndex(["legacy"])).toBeNull();
  });
});
