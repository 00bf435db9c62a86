import fs from "fs";
import { NotFoundError } from "../../../middleware/errorHandler";
import { makeTempDir, writeFile } from "../../../__tests__/helpers/fixtures";
import { readNote } from "../notes";

describe("readNote", () => {
  let root: string;

  beforeAll(() => {
    root = makeTempDir();
    writeFile(root, "notes/week-1.md", "# Week 1\n");
    writeFile(root, "secret.md", "outside notes");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("returns the note body", () => {
    expect(readNote(root, "week-1")).toEqual({ name: "week-1", body: "# Week 1\n" });
  });

  it("reports a missing note", () => {
    expect(() => readNote(root, "week-2")).toThrow("Note week-2 not found");
  });

  it("refuses names that could leave the notes directory", () => {
    expect(() => readNote(root, "../secret")).toThrow(NotFoundError);
    expect(() => readNote(root, "week-1.md")).toThrow(NotFoundError);
  });
});
