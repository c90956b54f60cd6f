/**
 * Dependency manifest recognition and parsing, one parser per ecosystem.
 */

import * as path from "path";
import { Ecosystem } from "../../review/types";

export interface DeclaredDependency {
  name: string;
  version: string;
}

export interface Manifest {
  ecosystem: Ecosystem;
  source_file: string;
  dependencies: DeclaredDependency[];
}

export type ManifestParseResult =
  | { ok: true; manifest: Manifest }
  | { ok: false; error: string };

type ManifestParser = (content: string) => DeclaredDependency[] | string;

// ============================================================================
// Recognition
// ============================================================================

/**
 * The ecosystem whose manifest format a path uses, if any.
 */
export function manifestEcosystem(filePath: string): Ecosystem | null {
  const base = path.posix.basename(filePath.replace(/\\/g, "/"));
  const lower = base.toLowerCase();

  if (lower === "package.json") return "npm";
  if (/^requirements.*\.txt$/.test(lower)) return "pypi";
  if (lower.endsWith(".csproj") || lower === "packages.config" || lower === "directory.packages.props") {
    return "nuget";
  }
  if (lower === "pom.xml") return "maven";
  return null;
}

// ============================================================================
// Parsers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNpm(content: string): DeclaredDependency[] | string {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return `invalid JSON: ${error instanceof Error ? error.message : String(error)}`;
  }
  if (!isRecord(data)) {
    return "package.json root is not an object";
  }

  const dependencies: DeclaredDependency[] = [];
  for (const field of ["dependencies", "devDependencies"]) {
    const section = data[field];
    if (!isRecord(section)) continue;
    for (const [name, version] of Object.entries(section)) {
      if (typeof version === "string") {
        dependencies.push({ name, version });
      }
    }
  }
  return dependencies;
}

const PINNED_REQUIREMENT = /^([A-Za-z0-9][A-Za-z0-9._-]*)(?:\[[^\]]*\])?\s*==\s*([^\s;#]+)/;

function parsePypi(content: string): DeclaredDependency[] | string {
  const dependencies: DeclaredDependency[] = [];
  for (const rawLine of content.split("\n")) {
    const line = rawLine.split("#")[0].trim();
    // Blank lines, options (-r, -e, --index-url) and unpinned requirements
    if (!line || line.startsWith("-")) continue;
    const match = PINNED_REQUIREMENT.exec(line);
    if (match) {
      dependencies.push({ name: match[1], version: match[2] });
    }
  }
  return dependencies;
}

function readAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const pattern = /([A-Za-z_][\w.-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(source)) !== null) {
    attributes.set(match[1].toLowerCase(), match[2] ?? match[3] ?? "");
  }
  return attributes;
}

function looksLikeXml(content: string): boolean {
  return /<[A-Za-z?!]/.test(content);
}

function parseNuget(content: string): DeclaredDependency[] | string {
  if (!looksLikeXml(content)) {
    return "not an XML document";
  }
  const dependencies: DeclaredDependency[] = [];
  const element = /<(PackageReference|PackageVersion|package)\b([^>]*)>/gi;
  let match: RegExpExecArray | null;
  while ((match = element.exec(content)) !== null) {
    const attributes = readAttributes(match[2]);
    const name = attributes.get("include") ?? attributes.get("id") ?? attributes.get("update");
    const version = attributes.get("version");
    if (name && version) {
      dependencies.push({ name, version });
    }
  }
  return dependencies;
}

function childText(block: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}>\\s*([^<]*?)\\s*</${tag}>`).exec(block);
  return match ? match[1] : undefined;
}

function parseMaven(content: string): DeclaredDependency[] | string {
  if (!looksLikeXml(content)) {
    return "not an XML document";
  }
  const dependencies: DeclaredDependency[] = [];
  const block = /<dependency>([\s\S]*?)<\/dependency>/g;
  let match: RegExpExecArray | null;
  while ((match = block.exec(content)) !== null) {
    const name = childText(match[1], "artifactId");
    const version = childText(match[1], "version");
    // Property references such as ${spring.version} are not resolved
    if (name && version && !version.includes("${")) {
      dependencies.push({ name, version });
    }
  }
  return dependencies;
}

const PARSERS: Record<Ecosystem, ManifestParser> = {
  npm: parseNpm,
  pypi: parsePypi,
  nuget: parseNuget,
  maven: parseMaven,
};

/**
 * Parse a manifest file. Returns null for paths that are not manifests.
 */
export function parseManifest(filePath: string, content: string): ManifestParseResult | null {
  const ecosystem = manifestEcosystem(filePath);
  if (!ecosystem) {
    return null;
  }
  const parsed = PARSERS[ecosystem](content);
  if (typeof parsed === "string") {
    return { ok: false, error: `${filePath}: ${parsed}` };
  }
  return { ok: true, manifest: { ecosystem, source_file: filePath, dependencies: parsed } };
}
