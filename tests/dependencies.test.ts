/**
 * Tests for dependency manifest parsing and vulnerability lookup.
 */

import { analyzeDependencies, emptyDependencySummary } from "../src/analysis/dependencies/analyzer";
import { findAdvisory } from "../src/analysis/dependencies/advisories";
import {
  DeclaredDependency,
  ManifestParseResult,
  manifestEcosystem,
  parseManifest,
} from "../src/analysis/dependencies/manifests";
import {
  compareVersions,
  normalizeVersion,
  parseVersion,
  satisfiesConstraint,
} from "../src/analysis/dependencies/version";
import { Change } from "../src/review/types";

function added(path: string, content: string): Change {
  return { path, change_type: "add", old_content: "", new_content: content, is_test_file: false };
}

function dependenciesOf(result: ManifestParseResult | null): DeclaredDependency[] {
  if (!result || !result.ok) {
    throw new Error("expected a parsed manifest");
  }
  return result.manifest.dependencies;
}

describe("analyzeDependencies", () => {
  it("should flag vulnerable packages across ecosystems", () => {
    const { summary, issues } = analyzeDependencies([
      added("package.json", JSON.stringify({ dependencies: { lodash: "^4.17.20" } })),
      added("requirements.txt", "django==3.2.0\n"),
    ]);

    expect(summary.total_packages_examined).toBe(2);
    expect(summary.has_issues).toBe(true);
    expect(summary.vulnerable_packages).toBe(2);
    expect(summary.packages_by_type).toEqual({ npm: 1, pypi: 1 });
    expect(summary.vulnerable_list).toEqual([
      "lodash@4.17.20 (CVE-2021-23337)",
      "django@3.2.0 (CVE-2023-31047)",
    ]);
    expect(summary.packages.every((p) => p.is_vulnerable)).toBe(true);
    expect(issues).toEqual([
      "CRITICAL: Vulnerable package lodash@4.17.20 - CVE-2021-23337 (affected <4.17.21)",
      "CRITICAL: Vulnerable package django@3.2.0 - CVE-2023-31047 (affected <3.2.19)",
    ]);
  });

  it("should count safe packages without flagging them", () => {
    const { summary, issues } = analyzeDependencies([
      added(
        "web/package.json",
        JSON.stringify({ dependencies: { lodash: "^4.17.21" }, devDependencies: { jest: "^29.7.0" } })
      ),
    ]);

    expect(summary.total_packages_examined).toBe(2);
    expect(summary.has_issues).toBe(false);
    expect(summary.packages.map((p) => `${p.name}@${p.version}`)).toEqual(["lodash@4.17.21", "jest@29.7.0"]);
    expect(issues).toEqual([]);
  });

  it("should discard manifests that fail to parse", () => {
    const { summary } = analyzeDependencies([
      added("package.json", "{ not json"),
      added("requirements.txt", "flask==2.0.0"),
    ]);

    expect(summary.total_packages_examined).toBe(1);
    expect(summary.vulnerable_list).toEqual(["flask@2.0.0 (CVE-2023-30861)"]);
  });

  it("should ignore deleted files and non-manifests", () => {
    const deleted: Change = {
      path: "package.json",
      change_type: "delete",
      old_content: JSON.stringify({ dependencies: { lodash: "4.0.0" } }),
      new_content: "",
      is_test_file: false,
    };

    const { summary } = analyzeDependencies([deleted, added("src/app.ts", "export {};")]);
    expect(summary).toEqual(emptyDependencySummary());
  });
});

describe("parseManifest", () => {
  it("should return null for files that are not manifests", () => {
    expect(parseManifest("README.md", "# hi")).toBeNull();
  });

  it("should report invalid JSON as an error result", () => {
    const result = parseManifest("package.json", "{");
    expect(result?.ok).toBe(false);
  });

  it("should read only pinned Python requirements", () => {
    const result = parseManifest(
      "requirements-dev.txt",
      "# tools\n-r requirements.txt\nrequests[socks]==2.28.0 ; python_version > '3'\npytest>=7\n"
    );

    expect(result).toEqual({
      ok: true,
      manifest: {
        ecosystem: "pypi",
        source_file: "requirements-dev.txt",
        dependencies: [{ name: "requests", version: "2.28.0" }],
      },
    });
  });

  it("should read NuGet package references", () => {
    const csproj = [
      '<Project Sdk="Microsoft.NET.Sdk">',
      "  <ItemGroup>",
      '    <PackageReference Include="Newtonsoft.Json" Version="12.0.3" />',
      '    <PackageReference Include="Serilog" />',
      "  </ItemGroup>",
      "</Project>",
    ].join("\n");

    const result = parseManifest("src/Api/Api.csproj", csproj);
    expect(dependenciesOf(result)).toEqual([{ name: "Newtonsoft.Json", version: "12.0.3" }]);

    const { summary } = analyzeDependencies([added("src/Api/Api.csproj", csproj)]);
    expect(summary.vulnerable_list).toEqual(["Newtonsoft.Json@12.0.3 (GHSA-5crp-9r3c-p9vr)"]);
  });

  it("should read packages.config entries", () => {
    const result = parseManifest(
      "packages.config",
      '<?xml version="1.0"?>\n<packages>\n  <package id="Dapper" version="2.0.123" />\n</packages>'
    );
    expect(dependenciesOf(result)).toEqual([{ name: "Dapper", version: "2.0.123" }]);
  });

  it("should read Maven dependencies and skip property references", () => {
    const pom = [
      "<project>",
      "  <dependencies>",
      "    <dependency>",
      "      <groupId>org.apache.logging.log4j</groupId>",
      "      <artifactId>log4j-core</artifactId>",
      "      <version>2.14.1</version>",
      "    </dependency>",
      "    <dependency>",
      "      <groupId>org.springframework</groupId>",
      "      <artifactId>spring-core</artifactId>",
      "      <version>${spring.version}</version>",
      "    </dependency>",
      "  </dependencies>",
      "</project>",
    ].join("\n");

    const result = parseManifest("pom.xml", pom);
    expect(dependenciesOf(result)).toEqual([{ name: "log4j-core", version: "2.14.1" }]);
  });

  it("should reject XML manifests that are not XML", () => {
    expect(parseManifest("pom.xml", "just text")).toEqual({
      ok: false,
      error: "pom.xml: not an XML document",
    });
  });
});

describe("manifestEcosystem", () => {
  it("should map manifest names to ecosystems", () => {
    expect(manifestEcosystem("a/b/package.json")).toBe("npm");
    expect(manifestEcosystem("requirements-test.txt")).toBe("pypi");
    expect(manifestEcosystem("Directory.Packages.props")).toBe("nuget");
    expect(manifestEcosystem("pom.xml")).toBe("maven");
    expect(manifestEcosystem("package-lock.json")).toBeNull();
  });
});

describe("versions", () => {
  it("should strip range operators", () => {
    expect(normalizeVersion("^4.17.20")).toBe("4.17.20");
    expect(normalizeVersion(">=1.2, <2")).toBe("1.2");
    expect(normalizeVersion("1.0 || 2.0")).toBe("1.0");
  });

  it("should compare numerically by segment", () => {
    expect(parseVersion("2.0.0-beta")).toEqual([2, 0, 0]);
    expect(parseVersion("latest")).toBeNull();
    expect(compareVersions([4, 17, 9], [4, 17, 21])).toBe(-1);
    expect(compareVersions([1, 0], [1, 0, 0])).toBe(0);
  });

  it("should evaluate affected ranges", () => {
    expect(satisfiesConstraint("4.17.20", "<4.17.21")).toBe(true);
    expect(satisfiesConstraint("4.17.21", "<4.17.21")).toBe(false);
    expect(satisfiesConstraint("4.17.21", "<=4.17.21")).toBe(true);
    expect(satisfiesConstraint("1.2.0", "=1.2")).toBe(true);
    expect(satisfiesConstraint("latest", "<1.0")).toBe(false);
  });

  it("should look up advisories case-insensitively", () => {
    expect(findAdvisory("nuget", "Newtonsoft.Json")?.id).toBe("GHSA-5crp-9r3c-p9vr");
    expect(findAdvisory("npm", "toString")).toBeUndefined();
  });
});
