/**
 * File categories and the lookup tables used to assign them.
 */

/**
 * Every category a changed file can be assigned.
 * DO NOT rename existing values - they appear in tool output.
 */
export type FileCategory =
  // Language sources
  | "csharp"
  | "razor_view"
  | "javascript"
  | "typescript"
  | "sql"
  | "python"
  | "java"
  // Test sources
  | "test_csharp"
  | "test_javascript"
  // Markup and styles
  | "markdown"
  | "html"
  | "css"
  | "xml"
  // Data and configuration
  | "json"
  | "yaml"
  | "config"
  // Package manifests
  | "package_javascript"
  | "package_csharp"
  | "package_python"
  | "package_java"
  | "default";

// ============================================================================
// Manifest Files
// ============================================================================

export const PACKAGE_FILES: Record<string, FileCategory> = {
  // JavaScript/Node.js
  "package.json": "package_javascript",
  "package-lock.json": "package_javascript",
  "yarn.lock": "package_javascript",
  "pnpm-lock.yaml": "package_javascript",
  "npm-shrinkwrap.json": "package_javascript",
  // C#/.NET
  "packages.config": "package_csharp",
  "Directory.Packages.props": "package_csharp",
  "Directory.Build.props": "package_csharp",
  "paket.dependencies": "package_csharp",
  "paket.lock": "package_csharp",
  // Python
  "requirements.txt": "package_python",
  "requirements-dev.txt": "package_python",
  "requirements-test.txt": "package_python",
  "setup.py": "package_python",
  "setup.cfg": "package_python",
  "pyproject.toml": "package_python",
  "Pipfile": "package_python",
  "Pipfile.lock": "package_python",
  "poetry.lock": "package_python",
  "environment.yml": "package_python",
  "environment.yaml": "package_python",
  "conda.yaml": "package_python",
  // Java
  "pom.xml": "package_java",
  "build.gradle": "package_java",
  "build.gradle.kts": "package_java",
  "settings.gradle": "package_java",
  "settings.gradle.kts": "package_java",
  "gradle.properties": "package_java",
  "ivy.xml": "package_java",
  "build.xml": "package_java",
};

export const PROJECT_FILE_EXTENSIONS = [".csproj", ".vbproj", ".fsproj"];

// ============================================================================
// Extensions
// ============================================================================

export const EXTENSION_MAP: Record<string, FileCategory> = {
  ".cs": "csharp",
  ".cshtml": "razor_view",
  ".razor": "razor_view",
  ".js": "javascript",
  ".jsx": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".sql": "sql",
  ".md": "markdown",
  ".markdown": "markdown",
  ".json": "json",
  ".xml": "xml",
  ".config": "config",
  ".css": "css",
  ".scss": "css",
  ".less": "css",
  ".html": "html",
  ".htm": "html",
  ".py": "python",
  ".yml": "yaml",
  ".yaml": "yaml",
  ".java": "java",
  ".gradle": "package_java",
  // Gradle Kotlin DSL
  ".kts": "package_java",
};

export const CONFIG_FILE_NAMES = new Set(["dockerfile", "containerfile", "makefile", "rakefile"]);

// ============================================================================
// Test Files
// ============================================================================

export const CSHARP_TEST_PATTERNS: RegExp[] = [
  /.*\.Tests?\.cs$/i,
  /.*Test\.cs$/i,
  /.*Tests\.cs$/i,
  /.*Spec\.cs$/i,
  /.*\.Test\./i,
  /.*\.Tests\./i,
  /.*\.IntegrationTests?\./i,
  /.*\.UnitTests?\./i,
];

export const JAVASCRIPT_TEST_PATTERNS: RegExp[] = [
  /.*\.test\.js$/i,
  /.*\.spec\.js$/i,
  /.*\.test\.ts$/i,
  /.*\.spec\.ts$/i,
  /.*\.test\.jsx$/i,
  /.*\.test\.tsx$/i,
  /__tests__\/.*\.(js|ts|jsx|tsx)$/i,
  /.*\.e2e\.(js|ts)$/i,
];

export const PYTHON_TEST_PATTERNS: RegExp[] = [/(^|\/)test_[^/]*\.py$/i, /_test\.py$/i];

// ============================================================================
// Category Groups
// ============================================================================

/**
 * Categories checked first, in order, when picking the dominant one.
 */
export const DOMINANT_PRIORITY: FileCategory[] = [
  "csharp",
  "razor_view",
  "typescript",
  "javascript",
  "sql",
  "test_csharp",
  "test_javascript",
];

/**
 * Categories that count towards mixed-review mode.
 * Manifests, markup and configuration never trigger it on their own.
 */
export const SIGNIFICANT_CATEGORIES = new Set<FileCategory>([
  "csharp",
  "razor_view",
  "javascript",
  "typescript",
  "sql",
  "test_csharp",
  "test_javascript",
]);

export const TEST_CATEGORIES = new Set<FileCategory>(["test_csharp", "test_javascript"]);

/**
 * "test_csharp" -> "Test Csharp"
 */
export function categoryTitle(category: FileCategory): string {
  return category
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}
