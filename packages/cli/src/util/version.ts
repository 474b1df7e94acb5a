import fs from "node:fs";
import path from "node:path";
import {fileURLToPath} from "node:url";
import {findUpSync} from "find-up";

// Global variable __dirname no longer available in ES6 modules.
const __dirname = path.dirname(fileURLToPath(import.meta.url));

type VersionJson = {
  /** "0.1.0" */
  version?: string;
};

/**
 * Version of the closest package.json, e.g. `v0.1.0`, or `unknown`
 */
export function getVersionData(): {version: string} {
  const filePath = findUpSync("package.json", {cwd: __dirname});
  if (!filePath) return {version: "unknown"};

  const packageJson = JSON.parse(fs.readFileSync(filePath, "utf8")) as VersionJson;
  return {version: packageJson.version ? `v${packageJson.version}` : "unknown"};
}
