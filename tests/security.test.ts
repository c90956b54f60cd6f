/**
 * Tests for the line-level security scanner.
 */

import {
  SECURITY_RECOMMENDATIONS,
  scanChangesSecurity,
  scanFileSecurity,
} from "../src/analysis/security/scanner";
import { isCommentLine } from "../src/analysis/security/comments";
import { isDuplicateIssue } from "../src/analysis/security/detectors";
import { Change } from "../src/review/types";

describe("scanFileSecurity", () => {
  it("should flag a password-revealing method once", () => {
    const findings = scanFileSecurity(
      "UserService.cs",
      "public class UserService\n{\n    public string RevealPassword() { return password; }\n}"
    );

    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      file_path: "UserService.cs",
      line_number: 3,
      message: "CRITICAL SECURITY: CRITICAL: RevealPassword method exposes sensitive password information",
      severity: "error",
      issue_type: "security",
      line_content: "public string RevealPassword() { return password; }",
    });
  });

  it("should skip comment lines", () => {
    const findings = scanFileSecurity("UserService.cs", "// return password;\n/* public string RevealPassword() */");
    expect(findings).toEqual([]);
  });

  it("should flag sensitive data in logging statements", () => {
    const findings = scanFileSecurity(
      "src/login.js",
      'const user = getUser();\nconsole.log("user password", password);'
    );

    expect(findings).toHaveLength(1);
    expect(findings[0].line_number).toBe(2);
    expect(findings[0].message).toBe(
      "CRITICAL SECURITY: CRITICAL: Sensitive data logged - passwords/secrets should never be logged"
    );
  });

  it("should join every message for a line into one finding", () => {
    const findings = scanFileSecurity("db/seed.sql", "UPDATE users SET password = 'changeme';");

    expect(findings).toHaveLength(1);
    expect(findings[0].message).toBe(
      "CRITICAL SECURITY: PASSWORD EXPOSURE: Hardcoded password value, SQL CREDENTIAL: Password or secret in SQL file"
    );
  });

  it("should flag hardcoded API keys", () => {
    const findings = scanFileSecurity("src/settings.ts", 'const apiKey = "abcdef0123456789abcd";');

    expect(findings.map((f) => f.message)).toEqual(["CRITICAL SECURITY: TOKEN LEAK: Hardcoded API key"]);
  });

  it("should flag ToString overrides that reach a password", () => {
    const content = [
      "public override string ToString()",
      "{",
      '    return $"{Name}:{Password}";',
      "}",
    ].join("\n");

    const findings = scanFileSecurity("Models/Account.cs", content);

    expect(findings.map((f) => [f.line_number, f.message])).toEqual([
      [1, "CRITICAL SECURITY: CRITICAL: ToString method exposes password information"],
      [3, "CRITICAL SECURITY: CRITICAL: Method returns password value directly"],
    ]);
  });

  it("should return nothing for empty or clean content", () => {
    expect(scanFileSecurity("a.cs", "")).toEqual([]);
    expect(scanFileSecurity("a.cs", "var total = items.Sum(i => i.Price);")).toEqual([]);
  });
});

describe("scanChangesSecurity", () => {
  const changes: Change[] = [
    {
      path: "UserService.cs",
      change_type: "edit",
      old_content: "",
      new_content: "public string RevealPassword() { return password; }",
      is_test_file: false,
    },
    {
      path: "Removed.cs",
      change_type: "delete",
      old_content: "public string RevealPassword() { return password; }",
      new_content: "",
      is_test_file: false,
    },
  ];

  it("should scan new content only and attach recommendations", () => {
    const result = scanChangesSecurity(changes);

    expect(result.findings).toHaveLength(1);
    expect(result.findings[0].file_path).toBe("UserService.cs");
    expect(result.recommendations).toEqual(SECURITY_RECOMMENDATIONS);
  });

  it("should not recommend anything without findings", () => {
    expect(scanChangesSecurity([changes[1]])).toEqual({ findings: [], recommendations: [] });
  });
});

describe("isCommentLine", () => {
  it("should use the comment syntax of the file's language", () => {
    expect(isCommentLine("  -- seed data", "db/seed.sql")).toBe(true);
    expect(isCommentLine("# token = 1", "tool.py")).toBe(true);
    expect(isCommentLine("<!-- password -->", "index.html")).toBe(true);
    expect(isCommentLine("# token = 1", "db/seed.sql")).toBe(false);
  });

  it("should match extensions regardless of case", () => {
    expect(isCommentLine("// return password;", "Services/A.CS")).toBe(true);
    expect(scanFileSecurity("Services/A.CS", "// return password;\n/* public string RevealPassword() */")).toEqual([]);
  });

  it("should treat unknown extensions as having no comments", () => {
    expect(isCommentLine("# note", "script.rb")).toBe(false);
  });
});

describe("isDuplicateIssue", () => {
  it("should require at least two shared words", () => {
    const existing = ["CRITICAL: RevealPassword method exposes sensitive password information"];

    expect(isDuplicateIssue("Method exposes password", existing)).toBe(true);
    expect(isDuplicateIssue("Hardcoded API key", ["Hardcoded password value"])).toBe(false);
  });
});
