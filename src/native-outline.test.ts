import { describe, expect, it } from "vitest";
import { renumberNativeOutline } from "./native-outline.ts";

describe("renumberNativeOutline", () => {
  it("shifts the shallowest bookmark depth to level 1 and converts pages to indexes", () => {
    const renumbered = renumberNativeOutline(
      [
        { level: 2, title: " Overview ", page: 1 },
        { level: 3, title: "Goals", page: 1 },
        { level: 2, title: "Design", page: 2 },
        { level: 4, title: "Storage", page: 2 },
      ],
      4,
    );
    expect(renumbered).toEqual([
      { level: 1, text: "Overview", pageIndex: 0 },
      { level: 2, text: "Goals", pageIndex: 0 },
      { level: 1, text: "Design", pageIndex: 1 },
      { level: 3, text: "Storage", pageIndex: 1 },
    ]);
  });

  it("discards bookmarks without a resolved page before renumbering", () => {
    const renumbered = renumberNativeOutline(
      [
        { level: 1, title: "Cover", page: 0 },
        { level: 2, title: "Summary", page: 3 },
      ],
      4,
    );
    expect(renumbered).toEqual([{ level: 1, text: "Summary", pageIndex: 2 }]);
  });

  it("caps deep bookmarks at the maximum heading level", () => {
    const renumbered = renumberNativeOutline(
      [
        { level: 1, title: "Root", page: 1 },
        { level: 6, title: "Deep", page: 1 },
      ],
      4,
    );
    expect(renumbered.map((entry) => entry.level)).toEqual([1, 4]);
  });

  it("returns nothing when no bookmark points at a page", () => {
    expect(renumberNativeOutline([{ level: 1, title: "Dangling", page: -1 }], 4)).toEqual([]);
  });
});
