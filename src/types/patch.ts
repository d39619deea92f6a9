export type PatchStage = 'validation' | 'apply' | 'commit' | 'state';

export type PatchErrorKind =
  | 'PatchValidationFailed'
  | 'PatchApplyFailed'
  | 'CommitFailed'
  | 'RetryBudgetExhausted'
  | 'ProposalNotFound'
  | 'InvalidTransition'
  | 'RepositoryMismatch';

export interface PatchSuccess {
  ok: true;
  proposalId: string;
  /** null for dry runs */
  commitId: string | null;
  dryRun: boolean;
}

export interface PatchFailure {
  ok: false;
  proposalId: string;
  stage: PatchStage;
  error: PatchErrorKind;
  message: string;
  retryable: boolean;
  timedOut?: boolean;
  /** Set when this failure used up the retry budget and the proposal is now failed */
  exhausted?: boolean;
}

export type PatchResult = PatchSuccess | PatchFailure;

export interface BatchResult {
  applied: number;
  failed: number;
  results: PatchResult[];
}

export interface HunkLine {
  op: ' ' | '-' | '+';
  /** Line text including its terminating newline, if it has one */
  text: string;
}

export interface Hunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: HunkLine[];
}

export interface FilePatch {
  /** Path without the a/ prefix, or null for /dev/null */
  oldPath: string | null;
  /** Path without the b/ prefix, or null for /dev/null */
  newPath: string | null;
  hunks: Hunk[];
}
