import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

enum FileFormat {
  json = "json",
  yaml = "yaml",
  yml = "yml",
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parse(contents: string, fileFormat: string): unknown {
  switch (fileFormat) {
    case FileFormat.json:
      return JSON.parse(contents);
    case FileFormat.yaml:
    case FileFormat.yml:
      return yaml.load(contents);
    default:
      throw Error(`Unsupported file format ${fileFormat}`);
  }
}

/**
 * Read a JSON serializable object from a file, parsed either from json or yaml.
 * `acceptedFormats` restricts the accepted file extensions.
 */
export function readFile(filepath: string, acceptedFormats?: string[]): Record<string, unknown> {
  const fileFormat = path.extname(filepath).slice(1);
  if (acceptedFormats && !acceptedFormats.includes(fileFormat)) throw new Error(`UnsupportedFileFormat: ${filepath}`);
  const contents = parse(fs.readFileSync(filepath, "utf-8"), fileFormat);
  if (!isObject(contents)) {
    throw Error(`File ${filepath} must contain an object`);
  }
  return contents;
}
