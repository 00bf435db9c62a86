import fs from "fs";
import path from "path";
import { noteNotFound } from "../../middleware/errors";

export interface Note {
  name: string;
  body: string;
}

const NOTE_NAME = /^[A-Za-z0-9_-]+$/;

/**
 * Read `notes/<name>.md` from the content root.
 */
export function readNote(root: string, name: string): Note {
  if (!NOTE_NAME.test(name)) {
    throw noteNotFound(name);
  }
  const file = path.join(root, "notes", `${name}.md`);
  if (!fs.existsSync(file)) {
    throw noteNotFound(name);
  }
  return { name, body: fs.readFileSync(file, "utf8") };
}
