/**
 * Pattern tables for credential and sensitive-data exposure detection.
 *
 * Each entry pairs a case-insensitive regex with the description reported
 * when it matches. Tables are evaluated in declaration order.
 */

export interface SecurityPattern {
  pattern: RegExp;
  description: string;
}

export interface PatternTable {
  id: string;
  /** Prefix placed before each description, e.g. "TOKEN LEAK". */
  label: string;
  patterns: SecurityPattern[];
}

export const PASSWORD_EXPOSURE_PATTERNS: SecurityPattern[] = [
  { pattern: /\b(reveal|get|show|display|expose|return|fetch|retrieve).*password\b/i, description: "Method exposes password" },
  { pattern: /\bpassword.*\.(get|show|reveal|display|expose|return|value|text)\b/i, description: "Property exposes password" },
  { pattern: /\b(public|export|global).*password\s*[=:]/i, description: "Public password assignment" },
  { pattern: /password\s*[:=]\s*["'][^"']{3,}["']/i, description: "Hardcoded password value" },
  { pattern: /(http|api|url|uri).*[?&]password=/i, description: "Password in URL parameter" },
  { pattern: /password\s*[!=]==?\s*["'][^"']+["']/i, description: "Password comparison with literal" },
  { pattern: /["']\s*password\s*["']\s*:\s*["'][^"']+["']/i, description: "Password in JSON/object structure" },
  { pattern: /\bpassword\s*\+\s*/i, description: "Password concatenation (potential exposure)" },
  { pattern: /\$\{?password\}?/i, description: "Password variable interpolation" },
];

export const CONNECTION_STRING_PATTERNS: SecurityPattern[] = [
  { pattern: /\b(connection[_-]?string|connectionstring)\s*[:=]\s*["'][^"']*password[^"']*["']/i, description: "Connection string with embedded password" },
  { pattern: /\b(data\s+source|server|database)\s*=.*password\s*=/i, description: "Database connection with password" },
  { pattern: /\b(mongodb|mysql|postgresql|mssql|oracle):\/\/[^\s]*:[^\s]*@/i, description: "Database URL with credentials" },
  { pattern: /\b(trusted_connection|integrated\s+security)\s*=\s*(false|no).*password/i, description: "Non-integrated auth with password" },
  { pattern: /\b(uid|user\s+id)\s*=.*pwd\s*=/i, description: "Database connection with user/password" },
  { pattern: /\b(provider|driver)\s*=.*password\s*=/i, description: "Data provider connection with password" },
];

export const TOKEN_PATTERNS: SecurityPattern[] = [
  { pattern: /\b(api[_-]?key|apikey)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded API key" },
  { pattern: /\b(secret[_-]?key|secretkey)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded secret key" },
  { pattern: /\b(access[_-]?token|accesstoken)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded access token" },
  { pattern: /\b(bearer[_-]?token|bearertoken)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded bearer token" },
  { pattern: /\b(refresh[_-]?token|refreshtoken)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded refresh token" },
  { pattern: /\b(private[_-]?key|privatekey)\s*[:=]\s*["'][a-zA-Z0-9+/=]{32,}["']/i, description: "Hardcoded private key" },
  { pattern: /\b(client[_-]?secret|clientsecret)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded client secret" },
  { pattern: /\b(oauth[_-]?token|oauthtoken)\s*[:=]\s*["'][a-zA-Z0-9]{16,}["']/i, description: "Hardcoded OAuth token" },
  { pattern: /\bauthorization\s*[:=]\s*["']bearer\s+[a-zA-Z0-9]{16,}["']/i, description: "Authorization header with token" },
  { pattern: /\b(jwt|token)\s*[:=]\s*["']ey[a-zA-Z0-9+/=]{16,}["']/i, description: "JWT token hardcoded" },
];

export const CLOUD_SECRET_PATTERNS: SecurityPattern[] = [
  { pattern: /\b(aws[_-]?access[_-]?key[_-]?id)\s*[:=]\s*["']AKIA[0-9A-Z]{16}["']/i, description: "AWS Access Key ID" },
  { pattern: /\b(aws[_-]?secret[_-]?access[_-]?key)\s*[:=]\s*["'][a-zA-Z0-9+/]{40}["']/i, description: "AWS Secret Access Key" },
  { pattern: /\b(azure[_-]?client[_-]?secret)\s*[:=]\s*["'][a-zA-Z0-9~._-]{34,}["']/i, description: "Azure Client Secret" },
  { pattern: /\b(gcp[_-]?service[_-]?account[_-]?key)\s*[:=]\s*["'][a-zA-Z0-9+/=]{500,}["']/i, description: "GCP Service Account Key" },
];

export const CERTIFICATE_PATTERNS: SecurityPattern[] = [
  { pattern: /-----BEGIN\s+(PRIVATE\s+KEY|RSA\s+PRIVATE\s+KEY|CERTIFICATE)/i, description: "Private key or certificate in code" },
  { pattern: /\b(ssl[_-]?cert|certificate)\s*[:=]\s*["'][^"']{50,}["']/i, description: "SSL certificate hardcoded" },
  { pattern: /\b(thumbprint|fingerprint)\s*[:=]\s*["'][a-fA-F0-9]{40,}["']/i, description: "Certificate thumbprint" },
];

export const PATTERN_TABLES: PatternTable[] = [
  { id: "password-exposure", label: "PASSWORD EXPOSURE", patterns: PASSWORD_EXPOSURE_PATTERNS },
  { id: "connection-string", label: "CONNECTION STRING LEAK", patterns: CONNECTION_STRING_PATTERNS },
  { id: "token", label: "TOKEN LEAK", patterns: TOKEN_PATTERNS },
  { id: "cloud-secret", label: "CLOUD SECRET LEAK", patterns: CLOUD_SECRET_PATTERNS },
  { id: "certificate", label: "CERTIFICATE LEAK", patterns: CERTIFICATE_PATTERNS },
];

// ============================================================================
// Keyword Lists
// ============================================================================

// Matched against the lowercased line
export const LOGGING_KEYWORDS = [
  "console.writeline",
  "console.write",
  "console.log",
  "log.info",
  "log.debug",
  "log.warn",
  "log.error",
  "log.trace",
  "logger.info",
  "logger.debug",
  "logger.warn",
  "logger.error",
  "logger.trace",
  "system.out.print",
  "system.err.print",
  "debug.print",
  "trace.write",
  "print(",
  "println(",
  "response.write",
  "response.send",
];

export const SENSITIVE_KEYWORDS = [
  "password",
  "passwd",
  "pwd",
  "secret",
  "token",
  "key",
  "credential",
  "auth",
  "connection",
  "connectionstring",
];

export const SECRET_WORDS = ["password", "secret", "key", "token"];

// ============================================================================
// File Families
// ============================================================================

export const CONFIG_FILE_EXTENSIONS = [".config", ".xml", ".json", ".yaml", ".yml", ".properties", ".env"];
export const CODE_FILE_EXTENSIONS = [".cs", ".java", ".js", ".ts", ".py", ".php"];
export const SQL_FILE_EXTENSIONS = [".sql", ".ddl"];

export function hasExtension(filePath: string, extensions: string[]): boolean {
  const lower = filePath.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}
