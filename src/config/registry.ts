import path from "path";
import { SourceRegistrySchema, SourceRegistryConfig } from "./sourceRegistry";
import { readJson } from "../utils/fs";
import { projectRoot } from "../io/paths";

export function defaultRegistryPath(): string {
  return path.join(projectRoot(), "config", "sources.json");
}

export async function loadRegistryConfig(registryPath: string): Promise<SourceRegistryConfig> {
  const data = await readJson<unknown>(registryPath);
  return SourceRegistrySchema.parse(data);
}
