import { describe, expect, it } from "vitest";
import { numberArg, parseArgs, stringArg } from "../../lib/cliArgs";
import { ConfigurationError } from "../../src/domain/errors";

describe("cli args", () => {
  it("parses --key=value pairs and bare flags", () => {
    expect(parseArgs(["--video=talk.mp4", "--srt", "stray", "--fps=2", "--out="])).toEqual({
      video: "talk.mp4",
      srt: true,
      fps: "2",
      out: ""
    });
  });

  it("treats empty and flag values as missing strings", () => {
    const args = parseArgs(["--out=", "--queue"]);
    expect(stringArg(args, "out")).toBeNull();
    expect(stringArg(args, "queue")).toBeNull();
    expect(stringArg(args, "video")).toBeNull();
  });

  it("reads numbers with a fallback", () => {
    const args = parseArgs(["--fps=0.5", "--bad=fast"]);
    expect(numberArg(args, "fps", 1)).toBe(0.5);
    expect(numberArg(args, "missing", 1)).toBe(1);
    expect(() => numberArg(args, "bad", 1)).toThrow(ConfigurationError);
  });
});
