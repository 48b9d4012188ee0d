import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

/** Writes a rendered report, creating missing parent directories. Returns the absolute path. */
export const writeReportFile = async (outputPath: string, rendered: string): Promise<string> => {
  const absolutePath = resolve(outputPath);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, rendered.endsWith("\n") ? rendered : `${rendered}\n`, "utf8");
  return absolutePath;
};
