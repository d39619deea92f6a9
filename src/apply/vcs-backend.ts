export type PatchCheck = { ok: true } | { ok: false; message: string };

export interface CommitRequest {
  /** Repository-relative paths to stage */
  paths: string[];
  message: string;
}

/**
 * Version-control capability used by the patch applier.
 *
 * validatePatch() must not touch the working tree. applyPatch() applies the
 * whole patch or nothing. commit() stages the given paths and returns the
 * new commit id.
 */
export interface VcsBackend {
  validatePatch(patch: string): Promise<PatchCheck>;
  applyPatch(patch: string): Promise<void>;
  commit(request: CommitRequest): Promise<string>;
}
