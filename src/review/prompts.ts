/**
 * Review instruction texts sent to the reviewing agent.
 */

import { FileCategory, categoryTitle } from "../analysis/categories";

// ============================================================================
// Condensed Guidelines (mixed reviews)
// ============================================================================

const CONDENSED_GUIDELINES: Partial<Record<FileCategory, string[]>> = {
  csharp: [
    "SOLID principles, dependency injection, async/await patterns",
    "Security: input validation, SQL injection prevention",
    "Performance: LINQ efficiency, memory management",
    "Null safety, error handling, proper disposal",
  ],
  razor_view: [
    "XSS prevention: proper encoding, avoid @Html.Raw with user input",
    "CSRF protection: @Html.AntiForgeryToken in forms",
    "Performance: minimize view logic, avoid database calls",
    "Model binding, partial views, JavaScript integration",
  ],
  javascript: [
    "Use const/let (never var), strict equality (===)",
    "Async patterns: Promises, async/await, error handling",
    "DOM efficiency, event delegation, memory leaks",
    "Security: XSS prevention, no eval(), input validation",
  ],
  typescript: [
    "Type safety: avoid 'any', use unknown when needed",
    "Interfaces, generics, discriminated unions",
    "Strict mode compliance, null checks",
    "Proper import/export patterns",
  ],
  sql: [
    "SQL injection prevention: parameterized queries",
    "Performance: indexes, execution plans, set-based logic",
    "Transactions, error handling, constraints",
    "Proper NULL handling, data types",
  ],
  test_csharp: [
    "Test coverage: edge cases, error conditions",
    "AAA pattern, single assertion per test",
    "Proper mocking, test independence",
    "Descriptive test names, fast execution",
  ],
  test_javascript: [
    "Test coverage: edge cases, rejected promises, error paths",
    "Isolated tests: no shared mutable state between cases",
    "Mocks restored after each test, no real network calls",
    "Descriptive test names, deterministic assertions",
  ],
};

const FALLBACK_GUIDELINES = ["Follow language best practices", "Ensure security and performance"];

export function condensedGuidelines(category: FileCategory): string {
  const items = CONDENSED_GUIDELINES[category] ?? FALLBACK_GUIDELINES;
  return items.map((item) => `- ${item}`).join("\n") + "\n";
}

// ============================================================================
// Full Instructions (single-category reviews)
// ============================================================================

interface CategoryInstruction {
  intro: string;
  focus: Record<string, string[]>;
}

const CATEGORY_INSTRUCTIONS: Partial<Record<FileCategory, CategoryInstruction>> = {
  csharp: {
    intro: "Review the C# changes in this pull request as a senior .NET engineer.",
    focus: {
      Design: [
        "SOLID principles and clear separation of responsibilities",
        "Constructor dependency injection instead of service location",
        "Interfaces at module seams, no leaking of infrastructure types",
      ],
      Correctness: [
        "Null safety: nullable reference types, guard clauses",
        "async/await all the way down, no .Result or .Wait()",
        "IDisposable resources released with using",
        "Exceptions caught at the right level and never swallowed",
      ],
      Security: [
        "Input validation on every public entry point",
        "Parameterized queries, no string-built SQL",
        "Secrets never logged, returned or exposed through properties",
      ],
      Performance: [
        "LINQ queries that do not enumerate more than once",
        "No synchronous I/O on request paths",
      ],
    },
  },
  razor_view: {
    intro: "Review the Razor views in this pull request.",
    focus: {
      Security: [
        "Output encoding: @Html.Raw never applied to user input",
        "@Html.AntiForgeryToken in every form that posts",
        "No secrets or connection details rendered into markup or scripts",
      ],
      Structure: [
        "Minimal logic in views; computation belongs in the model or controller",
        "Partial views and sections used for reuse",
        "Strongly typed models, no ViewBag for structured data",
      ],
      Scripts: [
        "Inline script blocks kept small and moved to bundles when large",
        "Server values passed to scripts through encoded data attributes",
      ],
    },
  },
  javascript: {
    intro: "Review the JavaScript changes in this pull request.",
    focus: {
      Correctness: [
        "const/let instead of var, strict equality",
        "Every promise awaited or returned, rejections handled",
        "No mutation of shared module state",
      ],
      Security: [
        "No eval or new Function on dynamic input",
        "DOM writes escaped; no innerHTML with user data",
        "Input validated at the boundary",
      ],
      Performance: [
        "Event listeners removed when elements go away",
        "Event delegation for large lists",
      ],
    },
  },
  typescript: {
    intro: "Review the TypeScript changes in this pull request.",
    focus: {
      Types: [
        "No 'any'; unknown narrowed before use",
        "Discriminated unions for variant data",
        "No non-null assertions or casts hiding real nullability",
      ],
      Correctness: [
        "Every promise awaited or returned, errors typed as unknown",
        "Strict mode compliance, explicit return types on exported functions",
      ],
      Modules: [
        "Type-only imports where only types are used",
        "No circular imports between modules",
      ],
    },
  },
  sql: {
    intro: "Review the SQL changes in this pull request.",
    focus: {
      Security: [
        "Dynamic SQL parameterized, never concatenated",
        "No credentials or secrets in scripts",
        "Least-privilege grants",
      ],
      Performance: [
        "Indexes supporting new predicates and joins",
        "Set-based logic instead of cursors",
      ],
      Integrity: [
        "Transactions around multi-statement changes with error handling",
        "Constraints and NULL handling explicit",
        "Migrations reversible",
      ],
    },
  },
  test_csharp: {
    intro: "Review the C# test changes in this pull request.",
    focus: {
      Coverage: [
        "Edge cases and error conditions, not only the happy path",
        "Bug fixes accompanied by a regression test reproducing the bug",
      ],
      Structure: [
        "Arrange / Act / Assert, one behavior per test",
        "Independent tests with no ordering assumptions",
        "Mocks for external dependencies only",
      ],
      Naming: ["Method_Scenario_ExpectedResult style names"],
    },
  },
  test_javascript: {
    intro: "Review the JavaScript and TypeScript test changes in this pull request.",
    focus: {
      Coverage: [
        "Edge cases, rejected promises and error paths",
        "Bug fixes accompanied by a regression test reproducing the bug",
      ],
      Structure: [
        "No shared mutable state between tests",
        "Mocks restored after each test, no real network or timers left running",
      ],
      Naming: ["Test names describing behavior, not implementation"],
    },
  },
};

// ============================================================================
// Shared Sections
// ============================================================================

export const RESPONSE_FORMAT = `
## Response Format

Format your response as JSON:
\`\`\`json
{
    "approved": true/false,
    "severity": "approved/minor/major/critical",
    "summary": "Overall assessment of the changes",
    "comments": [
        {
            "file_path": "path/to/file",
            "line_number": 123,
            "content": "Specific feedback",
            "severity": "info/warning/error"
        }
    ],
    "test_suggestions": [
        {
            "test_name": "TestClassName.TestMethodName",
            "description": "What this test should verify",
            "test_code": "// Stubbed test code"
        }
    ]
}
\`\`\`

## Severity Guidelines
- **approved**: Code meets standards, follows best practices
- **minor**: Style issues, minor improvements
- **major**: Performance, maintainability, or design issues
- **critical**: Security vulnerabilities, bugs, or data integrity issues

## Test Suggestions
For any bug fixes or new features, provide specific test suggestions with:
- Concrete test method names
- Description of what each test verifies
- Stubbed test code in the appropriate testing framework
- Focus on edge cases, error conditions, and critical paths
- For bug fixes: MUST include tests that verify the fix
`;

export const DEFAULT_INSTRUCTIONS = `Review the pull request for code quality, security, performance, and best practices.

Provide your review in JSON format:
{
    "approved": true/false,
    "severity": "approved/minor/major/critical",
    "summary": "Overall review summary",
    "comments": [
        {
            "file_path": "path/to/file",
            "line_number": 123,
            "content": "Your comment",
            "severity": "info/warning/error"
        }
    ]
}`;

/**
 * Full instruction text for a single-category review. Categories without
 * dedicated guidance get the default instructions.
 */
export function instructionsFor(category: FileCategory): string {
  const instruction = CATEGORY_INSTRUCTIONS[category];
  if (!instruction) {
    return DEFAULT_INSTRUCTIONS;
  }

  const parts = [`# ${categoryTitle(category)} Code Review\n`, `${instruction.intro}\n`];
  for (const [area, items] of Object.entries(instruction.focus)) {
    parts.push(`## ${area}`);
    parts.push(items.map((item) => `- ${item}`).join("\n") + "\n");
  }
  parts.push(RESPONSE_FORMAT);
  return parts.join("\n");
}
