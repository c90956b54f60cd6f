/**
 * Shared types for the review pipeline.
 */

// ============================================================================
// Pull Request Types
// ============================================================================

export type ChangeType = "add" | "edit" | "delete";

/**
 * A single changed file in a pull request.
 * Content fields are "" (never absent) when the content could not be fetched.
 */
export interface Change {
  path: string;
  change_type: ChangeType;
  original_path?: string;
  old_content: string;
  new_content: string;
  is_test_file: boolean;
}

export type PullRequestStatus = "active" | "completed" | "abandoned" | "all";

export interface PullRequestSummary {
  id: number;
  title: string;
  author: string;
  status: string;
  source_branch: string;
  target_branch: string;
  created_at: string;
}

/**
 * Review standing of a pull request as seen by this service's identity.
 * ownVote is null until this identity has reviewed.
 */
export interface ReviewerState {
  reviewerCount: number;
  ownVote: Vote | null;
}

export interface PullRequestMetadata {
  id: number;
  title: string;
  description: string;
  source_branch: string;
  target_branch: string;
  author: string;
  status: string;
}

/**
 * Identifies a pull request across repositories.
 * repositoryId is "owner/name".
 */
export interface PullRequestKey {
  repositoryId: string;
  pullRequestId: number;
}

export function formatPullRequestKey(key: PullRequestKey): string {
  return `${key.repositoryId}#${key.pullRequestId}`;
}

// ============================================================================
// Verdict Types
// ============================================================================

export type CommentSeverity = "info" | "warning" | "error";

export type VerdictSeverity = "approved" | "minor" | "major" | "critical";

export type Vote = 10 | 5 | 0 | -5 | -10;

export interface RawComment {
  file_path?: string;
  line_number?: number;
  content: string;
  severity: CommentSeverity;
  issue_type?: string;
}

export interface TestSuggestion {
  test_name: string;
  description: string;
  test_code: string;
  file_path?: string;
}

export interface ReviewVerdict {
  approved: boolean;
  /** One of VerdictSeverity when the agent behaves; unknown values map to a neutral vote. */
  severity: VerdictSeverity | string;
  summary: string;
  comments: RawComment[];
  test_suggestions: TestSuggestion[];
}

export interface CommentLocation {
  file_path: string;
  line_number: number;
}

export interface ConsolidatedComment {
  location: CommentLocation | null;
  content: string;
  severity: CommentSeverity;
}

// ============================================================================
// Analysis Result Types
// ============================================================================

export interface SecurityFinding {
  file_path: string;
  line_number: number;
  message: string;
  severity: "error";
  issue_type: "security";
  line_content: string;
}

export type Ecosystem = "npm" | "pypi" | "nuget" | "maven";

export interface DependencyPackage {
  ecosystem: Ecosystem;
  name: string;
  version: string;
  is_vulnerable: boolean;
  advisory?: string;
  source_file: string;
}

export interface DependencySummary {
  total_packages_examined: number;
  packages_by_type: Partial<Record<Ecosystem, number>>;
  vulnerable_packages: number;
  vulnerable_list: string[];
  has_issues: boolean;
  packages: DependencyPackage[];
}

// ============================================================================
// Publishing Types
// ============================================================================

export interface PostingResult {
  comments_posted: number;
  vote_updated: boolean;
  errors: string[];
  duplicate: boolean;
}
