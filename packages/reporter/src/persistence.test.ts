import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { writeReportFile } from "./persistence.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("writeReportFile", () => {
  it("creates parent directories and terminates the file with a newline", async () => {
    const dir = await mkdtemp(join(tmpdir(), "authorscope-report-"));
    tempDirs.push(dir);
    const target = join(dir, "reports", "jdoe.json");

    const written = await writeReportFile(target, '{"ok":true}');

    expect(written).toBe(target);
    expect(await readFile(target, "utf8")).toBe('{"ok":true}\n');
  });

  it("keeps an existing trailing newline", async () => {
    const dir = await mkdtemp(join(tmpdir(), "authorscope-report-"));
    tempDirs.push(dir);
    const target = join(dir, "jdoe.txt");

    await writeReportFile(target, "Summary\n");

    expect(await readFile(target, "utf8")).toBe("Summary\n");
  });
});
