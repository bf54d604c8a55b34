import { describe, it, expect } from "vitest";
import { byBirthtime, compareDocuments, type OrderingInput } from "./ordering";

function fakeStats(
  birthtimeMs: number,
  mtimeMs: number,
): OrderingInput["stats"] {
  return {
    birthtimeMs,
    birthtime: new Date(birthtimeMs),
    mtime: new Date(mtimeMs),
  };
}

describe("byBirthtime", () => {
  it("uses the birth time when the filesystem has one", () => {
    const stats = fakeStats(1000, 5000);
    expect(byBirthtime({ path: "/p/a.md", fileName: "a.md", stats })).toEqual(
      new Date(1000),
    );
  });

  it("falls back to the modification time", () => {
    const stats = fakeStats(0, 5000);
    expect(byBirthtime({ path: "/p/a.md", fileName: "a.md", stats })).toEqual(
      new Date(5000),
    );
  });
});

describe("compareDocuments", () => {
  const at = (ms: number, fileName: string) => ({
    createdAt: new Date(ms),
    fileName,
  });

  it("sorts oldest first, then by name", () => {
    const docs = [at(2, "b.md"), at(1, "z.md"), at(2, "a.md")];

    docs.sort(compareDocuments);

    expect(docs.map((doc) => doc.fileName)).toEqual(["z.md", "a.md", "b.md"]);
  });

  it("compares names by code unit, not locale", () => {
    const docs = [at(0, "a.md"), at(0, "B.md")];

    docs.sort(compareDocuments);

    expect(docs.map((doc) => doc.fileName)).toEqual(["B.md", "a.md"]);
  });
});
