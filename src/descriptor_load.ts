/**
 * Purpose: Read descriptor documents from JSON or YAML text and files.
 * Intent: Surface read and syntax failures as schema errors before validation starts.
 */

import { readFileSync } from "node:fs";
import * as yaml from "js-yaml";
import { parseDescriptor } from "./descriptor_parse.js";
import { SchemaError } from "./errors.js";
import type { Descriptor } from "./types.js";

export type DescriptorFormat = "json" | "yaml";

export function descriptorFormatOf(path: string): DescriptorFormat {
  const lower = path.toLowerCase();
  return lower.endsWith(".yaml") || lower.endsWith(".yml") ? "yaml" : "json";
}

/** Decode descriptor text without validating it. */
export function readDescriptorText(text: string, format: DescriptorFormat = "json"): unknown {
  try {
    return format === "yaml" ? yaml.load(text) : JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new SchemaError("document", `Invalid ${format.toUpperCase()} descriptor: ${detail}`);
  }
}

export function readDescriptorDocument(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new SchemaError("document", `Cannot read descriptor ${path}: ${detail}`);
  }
  return readDescriptorText(text, descriptorFormatOf(path));
}

export function parseDescriptorText(text: string, format: DescriptorFormat = "json"): Descriptor {
  return parseDescriptor(readDescriptorText(text, format));
}

export function loadDescriptorFile(path: string): Descriptor {
  return parseDescriptor(readDescriptorDocument(path));
}
