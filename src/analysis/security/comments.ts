/**
 * Comment-line recognition by file extension.
 */

interface CommentStyle {
  extensions: string[];
  prefixes: string[];
}

const COMMENT_STYLES: CommentStyle[] = [
  { extensions: [".cs", ".java", ".js", ".ts", ".tsx", ".jsx"], prefixes: ["//", "/*", "*"] },
  { extensions: [".py"], prefixes: ["#"] },
  { extensions: [".sql"], prefixes: ["--", "/*"] },
  { extensions: [".html", ".xml", ".xaml"], prefixes: ["<!--"] },
  { extensions: [".css"], prefixes: ["/*"] },
  { extensions: [".sh", ".bash"], prefixes: ["#"] },
];

/**
 * Whether a line is a comment in the language implied by the file extension.
 * Files with an unknown extension have no comment lines.
 */
export function isCommentLine(line: string, filePath: string): boolean {
  const trimmed = line.trim();
  const lowerPath = filePath.toLowerCase();
  const style = COMMENT_STYLES.find((s) => s.extensions.some((ext) => lowerPath.endsWith(ext)));
  if (!style) {
    return false;
  }
  return style.prefixes.some((prefix) => trimmed.startsWith(prefix));
}
