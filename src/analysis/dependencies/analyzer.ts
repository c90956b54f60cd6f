/**
 * Scans dependency manifests in a change set against the advisory table.
 */

import { createLogger } from "../../logger";
import { Change, DependencyPackage, DependencySummary } from "../../review/types";
import { findAdvisory } from "./advisories";
import { parseManifest } from "./manifests";
import { normalizeVersion, satisfiesConstraint } from "./version";

const log = createLogger("Dependencies");

export interface DependencyAnalysis {
  summary: DependencySummary;
  issues: string[];
}

export function emptyDependencySummary(): DependencySummary {
  return {
    total_packages_examined: 0,
    packages_by_type: {},
    vulnerable_packages: 0,
    vulnerable_list: [],
    has_issues: false,
    packages: [],
  };
}

export function analyzeDependencies(changes: Change[]): DependencyAnalysis {
  const summary = emptyDependencySummary();
  const issues: string[] = [];

  for (const change of changes) {
    if (change.change_type === "delete" || !change.new_content) continue;

    const result = parseManifest(change.path, change.new_content);
    if (!result) continue;
    if (!result.ok) {
      log.debug("Skipping unparseable manifest", { error: result.error });
      continue;
    }

    const { manifest } = result;
    for (const dep of manifest.dependencies) {
      const advisory = findAdvisory(manifest.ecosystem, dep.name);
      const hit = advisory && satisfiesConstraint(dep.version, advisory.affected) ? advisory : undefined;
      const pkg: DependencyPackage = {
        ecosystem: manifest.ecosystem,
        name: dep.name,
        version: normalizeVersion(dep.version),
        is_vulnerable: hit !== undefined,
        source_file: manifest.source_file,
      };

      summary.total_packages_examined++;
      summary.packages_by_type[manifest.ecosystem] = (summary.packages_by_type[manifest.ecosystem] ?? 0) + 1;

      if (hit) {
        pkg.advisory = hit.id;
        summary.vulnerable_packages++;
        summary.vulnerable_list.push(`${pkg.name}@${pkg.version} (${hit.id})`);
        issues.push(`CRITICAL: Vulnerable package ${pkg.name}@${pkg.version} - ${hit.id} (affected ${hit.affected})`);
      }
      summary.packages.push(pkg);
    }
  }

  summary.has_issues = summary.vulnerable_packages > 0;
  if (summary.total_packages_examined > 0) {
    log.info("Dependency scan complete", {
      examined: summary.total_packages_examined,
      vulnerable: summary.vulnerable_packages,
    });
  }
  return { summary, issues };
}
