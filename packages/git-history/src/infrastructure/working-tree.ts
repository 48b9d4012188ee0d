import { readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import type { WorkingTree } from "../application/history-reader.js";

const NEWLINE = 0x0a;

export const countLinesInBuffer = (content: Buffer): number => {
  if (content.length === 0) {
    return 0;
  }

  let newlines = 0;
  for (const byte of content) {
    if (byte === NEWLINE) {
      newlines += 1;
    }
  }

  return content[content.length - 1] === NEWLINE ? newlines : newlines + 1;
};

export class FsWorkingTree implements WorkingTree {
  constructor(private readonly rootPath: string) {}

  countLines(filePath: string): number | null {
    const absolutePath = join(this.rootPath, filePath);
    try {
      if (!statSync(absolutePath).isFile()) {
        return null;
      }

      return countLinesInBuffer(readFileSync(absolutePath));
    } catch (error) {
      if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
        return null;
      }

      throw error;
    }
  }
}
