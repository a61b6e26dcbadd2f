import { describe, it, expect } from "vitest";
import { expandTabs, nextTabStop, renderCaret, visualColumn } from "../src/diagnostics/format";

describe("format", () => {
  it("computes tab stops", () => {
    expect(nextTabStop(0, 4)).toBe(4);
    expect(nextTabStop(3, 4)).toBe(4);
    expect(nextTabStop(4, 4)).toBe(8);
    expect(nextTabStop(1, 8)).toBe(8);
  });

  it("expands tabs to the next stop", () => {
    expect(expandTabs("\ta")).toBe("    a");
    expect(expandTabs("ab\tc", 4)).toBe("ab  c");
    expect(expandTabs("a\tb", 8)).toBe("a       b");
    expect(expandTabs("no tabs")).toBe("no tabs");
  });

  it("maps a 1-based column to the spaces before the caret", () => {
    expect(visualColumn("abc", 1)).toBe(0);
    expect(visualColumn("abc", 3)).toBe(2);
    expect(visualColumn("ab\tc", 5, 4)).toBe(4);
  });

  it("points past the end of the line when the column is beyond it", () => {
    expect(visualColumn("abc", 10)).toBe(9);
  });

  it("renders the line and a caret under the column", () => {
    expect(renderCaret("x = @", 5)).toBe("x = @\n    ^");
    expect(renderCaret("\t\t$", 9, 4)).toBe("        $\n        ^");
  });
});
