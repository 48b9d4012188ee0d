import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { readRuntimeEnvironment } from "./application/environment.js";
import { createProgram, runCli } from "./program.js";

const readPackageVersion = (): string => {
  const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }

  return "0.0.0";
};

const program = createProgram(readRuntimeEnvironment(process.env), readPackageVersion());

await runCli(program, process.argv);
